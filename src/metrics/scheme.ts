import { Type, type Static } from '@sinclair/typebox'

/** Node colouring scheme: which metric drives a node's colour. */
export const ColoringScheme = Type.Union([
  Type.Literal('cum-sum'),
  Type.Literal('dep-count'),
  Type.Literal('rev-dep-count'),
], { $id: 'ColoringScheme', description: 'Metric used to colour crates' })

export type ColoringScheme = Static<typeof ColoringScheme>

/** Hovering a crate highlights its dependencies or its dependents. */
export const HighlightDirection = Type.Union([
  Type.Literal('dependencies'),
  Type.Literal('dependents'),
], { $id: 'HighlightDirection' })

export type HighlightDirection = Static<typeof HighlightDirection>

// Gamma < 1 stretches the low end, where most crates sit when a few dominate.
export const DEFAULT_GAMMA: Readonly<Record<ColoringScheme, number>> = {
  'cum-sum': 0.25,
  'dep-count': 0.25,
  'rev-dep-count': 0.5,
}

export const SCHEME_LABELS: Readonly<Record<ColoringScheme, string>> = {
  'cum-sum': 'cumulative sum',
  'dep-count': 'dependency count',
  'rev-dep-count': 'reverse dependency count',
}
