import type { DependencyGraph } from '../graph/index.js'
import { DEFAULT_GAMMA, type ColoringScheme } from './scheme.js'
import { cumulativeSizes, dependencyCounts, reverseDependencyCounts } from './values.js'

/** One metric per node, with the gamma curve used to map it onto a colour gradient. */
export class NodeValues {
  readonly scheme: ColoringScheme
  readonly values: readonly number[]
  readonly max: number
  private gammaValue: number

  constructor(scheme: ColoringScheme, values: readonly number[], gamma: number = DEFAULT_GAMMA[scheme]) {
    this.scheme = scheme
    this.values = values
    this.max = values.reduce((m, v) => Math.max(m, v), 0)
    this.gammaValue = clamp01(gamma)
  }

  static compute(graph: DependencyGraph, scheme: ColoringScheme, gamma?: number): NodeValues {
    switch (scheme) {
      case 'cum-sum':
        return new NodeValues(scheme, cumulativeSizes(graph), gamma)
      case 'dep-count':
        return new NodeValues(scheme, dependencyCounts(graph), gamma)
      case 'rev-dep-count':
        return new NodeValues(scheme, reverseDependencyCounts(graph), gamma)
    }
  }

  get gamma(): number {
    return this.gammaValue
  }

  set gamma(gamma: number) {
    this.gammaValue = clamp01(gamma)
  }

  value(index: number): number {
    return this.values[index] ?? 0
  }

  /** `(value / max) ^ gamma` in [0, 1]; 0 for every node when all values are 0. */
  output(index: number): number {
    if (this.max === 0) return 0
    return Math.pow(this.value(index) / this.max, this.gammaValue)
  }
}

function clamp01(x: number): number {
  if (Number.isNaN(x)) return 0
  return Math.min(1, Math.max(0, x))
}
