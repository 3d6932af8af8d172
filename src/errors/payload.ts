import { Type, type Static } from '@sinclair/typebox'

export const ErrorCode = Type.Union([
  Type.Literal('MALFORMED_INPUT'),
  Type.Literal('USAGE'),
  Type.Literal('AMBIGUOUS_SELECTOR'),
  Type.Literal('UNKNOWN_NODE'),
], { $id: 'ErrorCode', description: 'Failure category raised by the parser, graph or selectors' })

export type ErrorCode = Static<typeof ErrorCode>

export const ErrorPayload = Type.Object({
  code: ErrorCode,
  message: Type.String({ minLength: 1 }),
  details: Type.Optional(Type.Record(Type.String(), Type.Unknown())),
}, { $id: 'ErrorPayload', description: 'Serialised form of a cratemap failure.' })

export type ErrorPayload = Static<typeof ErrorPayload>
