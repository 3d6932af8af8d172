import type { FeatureMap } from './features.js'

/** A crate. `short` already has `-` rewritten to `_`, as the compiled artifacts name it. */
export interface CrateNode {
  readonly index: number
  readonly short: string
  /** Version, plus the source path or URL for path and git dependencies. */
  readonly extra: string
  /** `short` and `extra` joined by a space, e.g. `serde_json v1.0.120`. */
  readonly name: string
  readonly features: FeatureMap
}

/** `source` depends on `target`. */
export interface DependencyEdge {
  readonly source: number
  readonly target: number
  /** Feature of the source → features of the target it turns on. */
  readonly features: FeatureMap
}

/** `outgoing` follows edges to dependencies, `incoming` to dependents. */
export type Direction = 'outgoing' | 'incoming'

export interface CrateInput {
  short: string
  extra: string
  features?: Record<string, string[]>
}

export interface EdgeInput {
  source: number
  target: number
  features?: Record<string, string[]>
}

export interface SizeOptions {
  /** Binary name, when it differs from the root crate's name. */
  bin?: string
}
