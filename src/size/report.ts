import { Type, type Static } from '@sinclair/typebox'
import { Value } from '@sinclair/typebox/value'
import { MalformedInputError } from '../errors/index.js'

export const CrateSize = Type.Object({
  name: Type.String({ minLength: 1 }),
  size: Type.Integer({ minimum: 0, description: 'Bytes attributed to the crate in the binary' }),
})

export type CrateSize = Static<typeof CrateSize>

/**
 * Output of `cargo bloat -n0 --message-format=json --crates`.
 * Only `crates` is read; the other fields of the report pass through unchecked.
 */
export const SizeReport = Type.Object({
  'file-size': Type.Optional(Type.Integer({ minimum: 0 })),
  'text-section-size': Type.Optional(Type.Integer({ minimum: 0 })),
  crates: Type.Array(CrateSize),
}, { $id: 'SizeReport', description: 'Per-crate byte sizes of a compiled binary.' })

export type SizeReport = Static<typeof SizeReport>

export function parseSizeReport(text: string): SizeReport {
  let json: unknown
  try {
    json = JSON.parse(text)
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err)
    throw new MalformedInputError(`size report is not valid JSON (${reason})`)
  }
  if (!Value.Check(SizeReport, json)) {
    const first = Value.Errors(SizeReport, json).First()
    const where = first ? `${first.path || '/'}: ${first.message}` : 'unknown shape'
    throw new MalformedInputError(`size report does not match schema (${where})`)
  }
  return json
}
