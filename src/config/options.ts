import { Type, type Static } from '@sinclair/typebox'
import { Value } from '@sinclair/typebox/value'
import { UsageError } from '../errors/index.js'
import { ColoringScheme } from '../metrics/index.js'

export const Threshold = Type.Union([
  Type.Integer({ minimum: 0 }),
  Type.String({ minLength: 1, description: 'Human byte size such as "21KiB" or "69 KB", or "non-zero"' }),
])

export type Threshold = Static<typeof Threshold>

export const AnalysisOptions = Type.Object({
  root: Type.Optional(Type.String({ minLength: 1, description: 'Re-root at the unique crate matching this pattern' })),
  excludes: Type.Optional(Type.Array(Type.String({ minLength: 1 }), { description: 'Remove crates matching these patterns' })),
  selector: Type.Union([Type.Literal('prefix'), Type.Literal('regex')], { default: 'prefix' }),
  maxDepth: Type.Optional(Type.Integer({ minimum: 0, description: 'Remove crates deeper than this below the root' })),
  threshold: Type.Optional(Threshold),
  std: Type.Boolean({ default: false, description: 'Add a standalone std node' }),
  bin: Type.Optional(Type.String({ minLength: 1, description: 'Binary name when it differs from the root crate' })),
  scheme: Type.Union([ColoringScheme, Type.Literal('none')], { default: 'cum-sum' }),
  gamma: Type.Optional(Type.Number({ minimum: 0, maximum: 1 })),
  highlight: Type.Optional(Type.Union([Type.Literal('dep'), Type.Literal('rev-dep')])),
}, { $id: 'AnalysisOptions', description: 'Graph reduction and metric options.', additionalProperties: false })

export type AnalysisOptions = Static<typeof AnalysisOptions>

/** Fills defaults and validates; the first schema violation becomes a {@link UsageError}. */
export function parseOptions(input: unknown = {}): AnalysisOptions {
  const candidate = Value.Default(AnalysisOptions, Value.Clone(input))
  if (!Value.Check(AnalysisOptions, candidate)) {
    const first = Value.Errors(AnalysisOptions, candidate).First()
    const path = first?.path || '/'
    throw new UsageError(`invalid option ${path}: ${first?.message ?? 'unexpected value'}`, { path })
  }
  return candidate
}

const UNITS: Readonly<Record<string, number>> = {
  '': 1,
  b: 1,
  k: 1e3, kb: 1e3, kib: 1024, ki: 1024,
  m: 1e6, mb: 1e6, mib: 1024 ** 2, mi: 1024 ** 2,
  g: 1e9, gb: 1e9, gib: 1024 ** 3, gi: 1024 ** 3,
}

/** Bytes for a threshold: `"non-zero"` is 1, decimal units are powers of 1000, `i` units of 1024. */
export function parseThreshold(threshold: Threshold): number {
  if (typeof threshold === 'number') return threshold
  if (threshold.trim() === 'non-zero') return 1

  const match = /^\s*(\d+(?:\.\d+)?)\s*([a-z]*)\s*$/i.exec(threshold)
  const factor = match ? UNITS[match[2].toLowerCase()] : undefined
  if (!match || factor === undefined) {
    throw new UsageError(`invalid threshold "${threshold}"`, { threshold })
  }
  return Math.floor(Number(match[1]) * factor)
}
