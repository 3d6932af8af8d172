import { MalformedInputError } from '../errors/index.js'

const FEATURE_MARK = ' feature "'
const DEDUP_MARK = ' (*)'

export interface CrateLine {
  kind: 'crate'
  depth: number
  /** `"<short> <extra>"` as written, the identity of the crate within one listing. */
  key: string
  short: string
  extra: string
}

export interface FeatureLine {
  kind: 'feature'
  depth: number
  short: string
  feature: string
  /** Ends in `(*)`: the feature was expanded earlier in the listing. */
  backReference: boolean
}

export type TreeLine = CrateLine | FeatureLine

/**
 * Tokenises one line of `cargo tree --prefix=depth` output:
 * `2is-wsl v0.4.0 (*)` or `2is-wsl feature "default"`.
 */
export function readTreeLine(text: string, line: number): TreeLine {
  const start = text.search(/\p{Alphabetic}/u)
  if (start <= 0 || !/^\d+$/.test(text.slice(0, start))) {
    throw new MalformedInputError('expected a depth prefix followed by a crate name', line, text)
  }
  const depth = Number.parseInt(text.slice(0, start), 10)
  const rest = text.slice(start)

  let payload = rest
  while (payload.endsWith(DEDUP_MARK)) payload = payload.slice(0, -DEDUP_MARK.length)

  const space = payload.indexOf(' ')
  if (space <= 0 || space === payload.length - 1) {
    throw new MalformedInputError('expected a space between crate name and version', line, text)
  }
  const short = payload.slice(0, space)

  const mark = payload.indexOf(FEATURE_MARK)
  if (mark >= 0) {
    const open = mark + FEATURE_MARK.length
    if (payload.length <= open + 1 || !payload.endsWith('"')) {
      throw new MalformedInputError('unterminated feature name', line, text)
    }
    return {
      kind: 'feature',
      depth,
      short,
      feature: payload.slice(open, -1),
      backReference: rest.endsWith('(*)'),
    }
  }

  return { kind: 'crate', depth, key: payload, short, extra: payload.slice(space + 1) }
}
