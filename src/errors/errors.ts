import type { ErrorCode, ErrorPayload } from './payload.js'

/** Base class of every failure raised by cratemap. */
export class CratemapError extends Error {
  readonly code: ErrorCode
  readonly details?: Record<string, unknown>

  constructor(code: ErrorCode, message: string, details?: Record<string, unknown>) {
    super(message)
    this.name = new.target.name
    this.code = code
    this.details = details
  }

  toJSON(): ErrorPayload {
    return this.details === undefined
      ? { code: this.code, message: this.message }
      : { code: this.code, message: this.message, details: this.details }
  }
}

/** Unrecoverable input error; carries the offending 1-based line when there is one. */
export class MalformedInputError extends CratemapError {
  readonly line?: number
  readonly text?: string

  constructor(reason: string, line?: number, text?: string) {
    super(
      'MALFORMED_INPUT',
      line === undefined ? reason : `${reason} at line ${line}: ${JSON.stringify(text ?? '')}`,
      line === undefined ? undefined : { line, text },
    )
    this.line = line
    this.text = text
  }
}

export class UsageError extends CratemapError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('USAGE', message, details)
  }
}

/** A root or exclude pattern that did not resolve to the expected number of crates. */
export class AmbiguousSelectorError extends CratemapError {
  readonly pattern: string
  readonly matches: string[]

  constructor(pattern: string, matches: string[]) {
    const reason = matches.length === 0
      ? `no crate matches "${pattern}"`
      : `"${pattern}" matches ${matches.length} crates: ${matches.join(', ')}`
    super('AMBIGUOUS_SELECTOR', reason, { pattern, matches })
    this.pattern = pattern
    this.matches = matches
  }
}

export class UnknownNodeError extends CratemapError {
  readonly index: number

  constructor(index: number) {
    super('UNKNOWN_NODE', `node ${index} does not exist in the graph`, { index })
    this.index = index
  }
}
