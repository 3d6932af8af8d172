/**
 * Per-node metrics over a dependency graph.
 *
 * Every function returns an array of length `graph.nodeCapacity`, indexed by
 * node index; removed slots hold 0 (or an empty list). Nothing is cached:
 * recompute after mutating the graph.
 */
import type { DependencyGraph } from '../graph/index.js'
import type { HighlightDirection } from './scheme.js'

/**
 * Own size plus an apportioned share of each dependency's cumulative size.
 *
 * A dependency shared by `k` dependents hands `floor(cum / k)` bytes to each,
 * so shared crates are not counted twice. The remainder of the division is
 * dropped, which keeps the values whole bytes.
 */
export function cumulativeSizes(graph: DependencyGraph): number[] {
  const values = new Array<number>(graph.nodeCapacity).fill(0)
  for (const index of graph.nodeIndices()) values[index] = graph.size(index) ?? 0

  for (const node of graph.topo().reverse()) {
    const sources = graph.neighbors(node, 'incoming')
    for (const source of sources) {
      values[source] += Math.floor(values[node] / sources.length)
    }
  }
  return values
}

/** Number of dependency relations reachable from each node, counted per path. */
export function dependencyCounts(graph: DependencyGraph): number[] {
  const values = new Array<number>(graph.nodeCapacity).fill(0)
  for (const node of graph.topo().reverse()) {
    for (const target of graph.neighbors(node, 'outgoing')) {
      values[node] += values[target] + 1
    }
  }
  return values
}

/**
 * Number of distinct paths from the root to each node. The root itself has
 * none, nor does anything the root cannot reach (the `std` node).
 */
export function reverseDependencyCounts(graph: DependencyGraph): number[] {
  const paths = new Array<number>(graph.nodeCapacity).fill(0)
  paths[graph.root] = 1
  for (const node of graph.topo()) {
    if (paths[node] === 0) continue
    for (const target of graph.neighbors(node, 'outgoing')) {
      paths[target] += paths[node]
    }
  }
  paths[graph.root] = 0
  return paths
}

/**
 * For each node, the sorted indices of the nodes whose hover should light it up.
 *
 * With `dependencies`, hovering X highlights X and everything it depends on,
 * so node v is tagged with itself and all of its transitive dependents. With
 * `dependents` it is the reverse: v is tagged with itself and all of its
 * transitive dependencies.
 */
export function highlightClasses(graph: DependencyGraph, direction: HighlightDirection): number[][] {
  const classes: Set<number>[] = Array.from({ length: graph.nodeCapacity }, () => new Set<number>())
  const order = graph.topo()

  if (direction === 'dependencies') {
    for (const node of order) {
      classes[node].add(node)
      for (const target of graph.neighbors(node, 'outgoing')) {
        for (const c of classes[node]) classes[target].add(c)
      }
    }
  } else {
    for (const node of order.reverse()) {
      classes[node].add(node)
      for (const target of graph.neighbors(node, 'outgoing')) {
        for (const c of classes[target]) classes[node].add(c)
      }
    }
  }

  return classes.map((set) => [...set].sort((a, b) => a - b))
}
