import { parseOptions, parseThreshold, type AnalysisOptions } from './config/index.js'
import type { DependencyGraph } from './graph/index.js'
import { NodeValues, cumulativeSizes, highlightClasses } from './metrics/index.js'
import { resolveExcludes, resolveRoot } from './select/index.js'
import { SizeTable } from './size/index.js'
import { parseTree } from './tree/index.js'

export interface Analysis {
  graph: DependencyGraph
  options: AnalysisOptions
  /** `undefined` when the scheme is `none`. */
  values: NodeValues | undefined
  /** Highlight classes per node index, when highlighting was requested. */
  classes: number[][] | undefined
  /** Indices removed by re-rooting, exclusion, depth and threshold, in that order. */
  removed: number[]
}

/** Parses both inputs into a graph carrying sizes, with the optional `std` node and bin merge applied. */
export function loadGraph(treeOutput: string, sizeReport: string, options: Pick<AnalysisOptions, 'std' | 'bin'>): DependencyGraph {
  const graph = parseTree(treeOutput)
  const sizes = SizeTable.parse(sizeReport)
  if (options.std) graph.addStdNode()
  graph.attachSizes(sizes, { bin: options.bin })
  return graph
}

/**
 * Crates whose cumulative size is below `threshold` bytes. The root and the
 * `std` node are never selected.
 */
export function smallCrates(graph: DependencyGraph, threshold: number): number[] {
  const sums = cumulativeSizes(graph)
  return graph.nodeIndices().filter((i) => i !== graph.root && i !== graph.std && sums[i] < threshold)
}

/**
 * Full pipeline: parse, size, then reduce the graph (root, excludes, depth,
 * threshold) and compute the metrics on what is left.
 */
export function analyze(treeOutput: string, sizeReport: string, input: unknown = {}): Analysis {
  const options = parseOptions(input)
  const graph = loadGraph(treeOutput, sizeReport, options)
  const removed: number[] = []

  if (options.root !== undefined) {
    removed.push(...graph.changeRoot(resolveRoot(graph, options.root, options.selector)))
  }
  if (options.excludes !== undefined && options.excludes.length > 0) {
    removed.push(...graph.removeNodes(resolveExcludes(graph, options.excludes, options.selector)))
  }
  if (options.maxDepth !== undefined) {
    removed.push(...graph.removeBeyondDepth(options.maxDepth))
  }
  if (options.threshold !== undefined) {
    removed.push(...graph.removeNodes(smallCrates(graph, parseThreshold(options.threshold))))
  }

  const values = options.scheme === 'none' ? undefined : NodeValues.compute(graph, options.scheme, options.gamma)
  const classes = options.highlight === undefined
    ? undefined
    : highlightClasses(graph, options.highlight === 'dep' ? 'dependencies' : 'dependents')

  return { graph, options, values, classes, removed }
}
