import { describe, it, expect } from 'vitest'
import '../src/formats.js' // register date-time format validator
import { Value } from '@sinclair/typebox/value'
import {
  DependencyGraph,
  FeatureMap,
  GraphSnapshot,
  SizeTable,
  UnknownNodeError,
  UsageError,
  formatFeatures,
  toSnapshot,
  type CrateInput,
} from '../src/index.js'

const crate = (short: string, extra = 'v1.0.0'): CrateInput => ({ short, extra })

/** a → b, a → c, b → d, c → d */
function diamond(): DependencyGraph {
  return DependencyGraph.from(
    [crate('a'), crate('b'), crate('c'), crate('d')],
    [{ source: 0, target: 1 }, { source: 0, target: 2 }, { source: 1, target: 3 }, { source: 2, target: 3 }],
  )
}

/** root → a → b → c */
function chain(): DependencyGraph {
  return DependencyGraph.from(
    [crate('root', 'v0.1.0'), crate('a'), crate('b'), crate('c')],
    [{ source: 0, target: 1 }, { source: 1, target: 2 }, { source: 2, target: 3 }],
  )
}

describe('FeatureMap', () => {
  it('keeps sub-features when a feature is enabled again', () => {
    const features = new FeatureMap()
    features.append('default', 'std')
    features.enable('default')
    expect(features.get('default')).toEqual(['std'])
  })

  it('stores each pair once', () => {
    const features = new FeatureMap()
    features.merge({ default: ['std', 'alloc'] })
    features.merge({ default: ['std'], alloc: [] })
    expect(features.toRecord()).toEqual({ alloc: [], default: ['std', 'alloc'] })
  })

  it('formats features in name order', () => {
    const features = new FeatureMap()
    features.enable('std')
    features.merge({ default: ['std', 'derive'] })
    expect(formatFeatures(features)).toBe('default(std,derive),\nstd')
    expect(formatFeatures(new FeatureMap())).toBe('')
  })
})

describe('DependencyGraph construction', () => {
  it('names crates "short extra" with hyphens normalised', () => {
    const graph = new DependencyGraph()
    const index = graph.addNode('serde-json', 'v1.0.0')
    expect(graph.node(index)).toMatchObject({ index: 0, short: 'serde_json', extra: 'v1.0.0', name: 'serde_json v1.0.0' })
  })

  it('returns the existing edge on a repeated mention', () => {
    const graph = new DependencyGraph()
    graph.addNode('a', 'v1.0.0')
    graph.addNode('b', 'v1.0.0')
    const first = graph.addEdge(0, 1)
    expect(graph.addEdge(0, 1)).toBe(first)
    expect(graph.edgeCount).toBe(1)
  })

  it('rejects a self-loop', () => {
    const graph = new DependencyGraph()
    graph.addNode('a', 'v1.0.0')
    expect(() => graph.addEdge(0, 0)).toThrow(UsageError)
  })

  it('rejects an edge to a missing node', () => {
    const graph = new DependencyGraph()
    graph.addNode('a', 'v1.0.0')
    expect(() => graph.addEdge(0, 5)).toThrow(UnknownNodeError)
  })

  it('from() prunes what the root cannot reach', () => {
    const graph = DependencyGraph.from([crate('a'), crate('b'), crate('c')], [{ source: 0, target: 1 }])
    expect(graph.nodeIndices()).toEqual([0, 1])
  })

  it('from() rejects cycles and empty node lists', () => {
    expect(() =>
      DependencyGraph.from(
        [crate('a'), crate('b'), crate('c')],
        [{ source: 0, target: 1 }, { source: 1, target: 2 }, { source: 2, target: 1 }],
      ),
    ).toThrow(UsageError)
    expect(() => DependencyGraph.from([], [])).toThrow(UsageError)
  })

  it('from() copies features onto nodes and edges', () => {
    const graph = DependencyGraph.from(
      [{ short: 'a', extra: 'v1.0.0', features: { default: ['std'] } }, crate('b')],
      [{ source: 0, target: 1, features: { std: ['alloc'] } }],
    )
    expect(graph.node(0).features.toRecord()).toEqual({ default: ['std'] })
    expect(graph.edge(0, 1).features.toRecord()).toEqual({ std: ['alloc'] })
  })

  it('adds the std node once and keeps it unreachable', () => {
    const graph = diamond()
    const std = graph.addStdNode()
    expect(graph.addStdNode()).toBe(std)
    expect(graph.std).toBe(4)
    expect(graph.node(std).name).toBe('std')
    expect(graph.pruneUnreachable()).toEqual([])
    expect(graph.hasNode(std)).toBe(true)
  })
})

describe('DependencyGraph sizes', () => {
  it('splits a shared short-name entry between its nodes', () => {
    const graph = DependencyGraph.from(
      [crate('app', 'v0.1.0'), crate('syn', 'v1.0.0'), crate('syn', 'v2.0.0')],
      [{ source: 0, target: 1 }, { source: 0, target: 2 }],
    )
    graph.attachSizes(SizeTable.fromReport({ crates: [{ name: 'app', size: 10 }, { name: 'syn', size: 301 }] }))
    expect(graph.size(0)).toBe(10)
    expect(graph.size(1)).toBe(150)
    expect(graph.size(2)).toBe(150)
  })

  it('adds the binary entry onto the root crate', () => {
    const graph = diamond()
    graph.attachSizes(SizeTable.fromReport({ crates: [{ name: 'a', size: 100 }, { name: 'a_cli', size: 50 }] }), { bin: 'a_cli' })
    expect(graph.size(0)).toBe(150)
    expect(graph.size(3)).toBeUndefined()
  })

  it('does not normalise a table twice', () => {
    const table = SizeTable.fromReport({ crates: [{ name: 'b', size: 9 }] })
    table.normalize(new Map([['b', 3]]))
    diamond().attachSizes(table)
    expect(table.get('b')).toBe(3)
  })
})

describe('DependencyGraph traversals', () => {
  it('orders a crate before its dependencies', () => {
    const graph = diamond()
    expect(graph.topo()).toEqual([0, 1, 2, 3])
    expect(graph.isAcyclic()).toBe(true)
  })

  it('walks depth-first and breadth-first from the root', () => {
    const graph = diamond()
    expect(graph.dfs()).toEqual([0, 1, 3, 2])
    expect(graph.bfs()).toEqual([0, 1, 2, 3])
  })

  it('counts hops from the root, leaving out the std node', () => {
    const graph = diamond()
    graph.addStdNode()
    expect([...graph.depthsFromRoot()]).toEqual([[0, 0], [1, 1], [2, 1], [3, 2]])
  })

  it('lists neighbours in both directions', () => {
    const graph = diamond()
    expect(graph.neighbors(0)).toEqual([1, 2])
    expect(graph.neighbors(3, 'incoming')).toEqual([1, 2])
  })
})

describe('DependencyGraph mutations', () => {
  it('pruning twice removes nothing the second time', () => {
    const graph = diamond()
    expect(graph.pruneUnreachable()).toEqual([])
    expect(graph.pruneUnreachable()).toEqual([])
    expect(graph.nodeCount).toBe(4)
  })

  it('keeps a node still reachable through another path', () => {
    const graph = diamond()
    expect(graph.removeNodes([1])).toEqual([1])
    expect(graph.nodeIndices()).toEqual([0, 2, 3])
    expect(graph.removeNodes([2])).toEqual([2, 3])
    expect(graph.nodeIndices()).toEqual([0])
  })

  it('leaves no edge pointing at a removed node', () => {
    const graph = diamond()
    graph.removeNodes([1])
    expect(graph.neighbors(0)).toEqual([2])
    expect(graph.neighbors(3, 'incoming')).toEqual([2])
    expect(graph.edgeCount).toBe(2)
  })

  it('refuses to remove the root', () => {
    expect(() => diamond().removeNodes([0])).toThrow(UsageError)
  })

  it('skips the std node', () => {
    const graph = diamond()
    const std = graph.addStdNode()
    expect(graph.removeNodes([std])).toEqual([])
    expect(graph.hasNode(std)).toBe(true)
  })

  it('rejects stale indices', () => {
    const graph = diamond()
    graph.removeNodes([1])
    expect(() => graph.node(1)).toThrow(UnknownNodeError)
    expect(() => graph.removeNodes([1])).toThrow(UnknownNodeError)
    expect(graph.nodeCapacity).toBe(4)
    expect(graph.nodeCount).toBe(3)
  })

  it('re-roots and drops what the new root cannot reach', () => {
    const graph = diamond()
    expect(graph.changeRoot(1)).toEqual([0, 2])
    expect(graph.root).toBe(1)
    expect(graph.nodeIndices()).toEqual([1, 3])
    expect(graph.topo()).toEqual([1, 3])
  })

  it('keeps the std node when re-rooting', () => {
    const graph = diamond()
    const std = graph.addStdNode()
    expect(graph.changeRoot(2)).toEqual([0, 1])
    expect(graph.nodeIndices()).toEqual([2, 3, std])
  })

  it('keeps nodes within the depth limit', () => {
    const graph = chain()
    expect(graph.removeBeyondDepth(1)).toEqual([2, 3])
    expect(graph.nodeIndices()).toEqual([0, 1])
  })

  it('keeps only the root at depth 0', () => {
    const graph = chain()
    graph.removeBeyondDepth(0)
    expect(graph.nodeIndices()).toEqual([0])
  })

  it('rejects a negative depth', () => {
    expect(() => chain().removeBeyondDepth(-1)).toThrow(UsageError)
  })
})

describe('toSnapshot', () => {
  it('produces a valid GraphSnapshot with sparse indices', () => {
    const graph = diamond()
    graph.attachSizes(SizeTable.fromReport({ crates: [{ name: 'a', size: 10 }] }))
    graph.removeNodes([1])
    const snapshot = toSnapshot(graph, new Date('2026-01-02T03:04:05.000Z'))

    expect(Value.Check(GraphSnapshot, snapshot)).toBe(true)
    expect(snapshot.generated).toBe('2026-01-02T03:04:05.000Z')
    expect(snapshot.std).toBeNull()
    expect(snapshot.nodes.map((n) => n.index)).toEqual([0, 2, 3])
    expect(snapshot.nodes[0]).toEqual({ index: 0, name: 'a v1.0.0', short: 'a', extra: 'v1.0.0', size: 10, features: {} })
    expect(snapshot.nodes[1].size).toBeNull()
    expect(snapshot.edges).toEqual([
      { source: 0, target: 2, features: {} },
      { source: 2, target: 3, features: {} },
    ])
  })
})
