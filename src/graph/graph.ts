import { UnknownNodeError, UsageError } from '../errors/index.js'
import { SizeTable } from '../size/index.js'
import { FeatureMap } from './features.js'
import type { CrateInput, CrateNode, DependencyEdge, Direction, EdgeInput, SizeOptions } from './types.js'

interface Slot {
  crate: CrateNode
  outgoing: Map<number, DependencyEdge>
  incoming: Set<number>
}

export const STD_SHORT = 'std'

/**
 * Dependency DAG of crates with size information.
 *
 * Nodes live in a slot arena: an index stays valid until its node is removed,
 * and removal leaves a hole rather than shifting other nodes. Iterate with
 * {@link nodeIndices} or one of the ordered traversals, never `0..nodeCount`.
 *
 * After construction the graph only shrinks. Every public mutation finishes by
 * dropping the nodes no longer reachable from the root, except the optional
 * `std` node which stands alone.
 */
export class DependencyGraph {
  private readonly slots: (Slot | undefined)[] = []
  private rootIndex = 0
  private stdIndex: number | undefined
  private live = 0
  private sizes = new SizeTable()

  static from(nodes: readonly CrateInput[], edges: readonly EdgeInput[]): DependencyGraph {
    if (nodes.length === 0) throw new UsageError('a dependency graph needs at least one crate')
    const graph = new DependencyGraph()
    for (const n of nodes) {
      const index = graph.addNode(n.short, n.extra)
      if (n.features) graph.node(index).features.merge(n.features)
    }
    for (const e of edges) {
      const edge = graph.addEdge(e.source, e.target)
      if (e.features) edge.features.merge(e.features)
    }
    if (!graph.isAcyclic()) throw new UsageError('dependency edges form a cycle')
    graph.pruneUnreachable()
    return graph
  }

  // ─── Construction ───────────────────────────────────────────────

  /** Appends a crate and returns its index. The first crate becomes the root. */
  addNode(short: string, extra: string): number {
    const index = this.slots.length
    const normalized = short.replace(/-/g, '_')
    const crate: CrateNode = {
      index,
      short: normalized,
      extra,
      name: extra.length > 0 ? `${normalized} ${extra}` : normalized,
      features: new FeatureMap(),
    }
    this.slots.push({ crate, outgoing: new Map(), incoming: new Set() })
    this.live++
    return index
  }

  /** Returns the edge `source → target`, creating it on first mention. */
  addEdge(source: number, target: number): DependencyEdge {
    if (source === target) throw new UsageError(`crate ${source} cannot depend on itself`)
    const from = this.slot(source)
    const to = this.slot(target)
    const existing = from.outgoing.get(target)
    if (existing) return existing
    const edge: DependencyEdge = { source, target, features: new FeatureMap() }
    from.outgoing.set(target, edge)
    to.incoming.add(source)
    return edge
  }

  /** Adds the standalone `std` node once and returns its index. */
  addStdNode(): number {
    if (this.stdIndex !== undefined) return this.stdIndex
    this.stdIndex = this.addNode(STD_SHORT, '')
    return this.stdIndex
  }

  /**
   * Installs the size table. When `bin` is given its entry is added onto the
   * root crate's entry first; the table is then normalised by the number of
   * nodes sharing each short-name.
   */
  attachSizes(table: SizeTable, options: SizeOptions = {}): void {
    if (!table.isNormalized) {
      if (options.bin !== undefined) {
        table.add(this.node(this.rootIndex).short, table.get(options.bin) ?? 0)
      }
      table.normalize(this.shortNameCounts())
    }
    this.sizes = table
  }

  // ─── Queries ────────────────────────────────────────────────────

  get root(): number {
    return this.rootIndex
  }

  get std(): number | undefined {
    return this.stdIndex
  }

  /** Live nodes. Indices may exceed this once nodes were removed. */
  get nodeCount(): number {
    return this.live
  }

  /** Upper bound of node indices; size metric arrays with this. */
  get nodeCapacity(): number {
    return this.slots.length
  }

  get edgeCount(): number {
    let count = 0
    for (const s of this.slots) if (s) count += s.outgoing.size
    return count
  }

  nodeIndices(): number[] {
    const indices: number[] = []
    this.slots.forEach((s, i) => {
      if (s) indices.push(i)
    })
    return indices
  }

  hasNode(index: number): boolean {
    return this.slots[index] !== undefined
  }

  node(index: number): CrateNode {
    return this.slot(index).crate
  }

  findEdge(source: number, target: number): DependencyEdge | undefined {
    return this.slots[source]?.outgoing.get(target)
  }

  edge(source: number, target: number): DependencyEdge {
    const edge = this.findEdge(source, target)
    if (!edge) throw new UsageError(`no dependency ${source} -> ${target}`, { source, target })
    return edge
  }

  edges(): DependencyEdge[] {
    const all: DependencyEdge[] = []
    for (const s of this.slots) if (s) all.push(...s.outgoing.values())
    return all
  }

  /** Dependencies (`outgoing`) or dependents (`incoming`) of a node, in insertion order. */
  neighbors(index: number, direction: Direction = 'outgoing'): number[] {
    const s = this.slot(index)
    return direction === 'outgoing' ? [...s.outgoing.keys()] : [...s.incoming]
  }

  /** Normalised size of the crate, or `undefined` when the size report does not list it. */
  size(index: number): number | undefined {
    return this.sizes.get(this.node(index).short)
  }

  shortNameCounts(): Map<string, number> {
    const counts = new Map<string, number>()
    for (const s of this.slots) {
      if (s) counts.set(s.crate.short, (counts.get(s.crate.short) ?? 0) + 1)
    }
    return counts
  }

  // ─── Traversals ─────────────────────────────────────────────────

  /** Kahn's order over every live node: a crate always precedes its dependencies. */
  topo(): number[] {
    const order = this.kahn()
    if (order.length !== this.live) throw new UsageError('dependency edges form a cycle')
    return order
  }

  isAcyclic(): boolean {
    return this.kahn().length === this.live
  }

  /** Depth-first preorder from the root. */
  dfs(): number[] {
    const order: number[] = []
    const seen = new Set<number>()
    const stack = [this.rootIndex]
    while (stack.length > 0) {
      const current = stack.pop()
      if (current === undefined || seen.has(current)) continue
      seen.add(current)
      order.push(current)
      const targets = this.neighbors(current, 'outgoing')
      for (let i = targets.length - 1; i >= 0; i--) {
        if (!seen.has(targets[i])) stack.push(targets[i])
      }
    }
    return order
  }

  /** Breadth-first order from the root. */
  bfs(): number[] {
    return [...this.depths().keys()]
  }

  /** Hops from the root to every reachable node, in breadth-first order. */
  depthsFromRoot(): Map<number, number> {
    return this.depths()
  }

  // ─── Mutations ──────────────────────────────────────────────────

  /** Makes `index` the root and drops what it cannot reach. Returns the removed indices. */
  changeRoot(index: number): number[] {
    this.slot(index)
    this.rootIndex = index
    return this.pruneUnreachable()
  }

  /**
   * Removes the given nodes with their edges, then whatever became unreachable.
   * The `std` node is skipped; the root cannot be removed. Returns every index removed.
   */
  removeNodes(indices: Iterable<number>): number[] {
    const targets = new Set(indices)
    for (const index of targets) {
      this.slot(index)
      if (index === this.rootIndex) {
        throw new UsageError(`cannot remove the root crate ${this.node(index).name}`, { index })
      }
    }
    const removed: number[] = []
    for (const index of targets) {
      if (index === this.stdIndex) continue
      this.detach(index)
      removed.push(index)
    }
    return [...removed, ...this.pruneUnreachable()]
  }

  /** Keeps the root and the nodes at most `maxDepth` edges below it. Returns the removed indices. */
  removeBeyondDepth(maxDepth: number): number[] {
    if (!Number.isInteger(maxDepth) || maxDepth < 0) {
      throw new UsageError(`max depth must be a non-negative integer, got ${maxDepth}`)
    }
    return this.removeWhere(this.depths(maxDepth))
  }

  /** Drops every non-std node the root cannot reach. Returns the removed indices. */
  pruneUnreachable(): number[] {
    return this.removeWhere(new Set(this.dfs()))
  }

  // ─── Internals ──────────────────────────────────────────────────

  private slot(index: number): Slot {
    const s = this.slots[index]
    if (!s) throw new UnknownNodeError(index)
    return s
  }

  private kahn(): number[] {
    const indegree = new Map<number, number>()
    const queue: number[] = []
    this.slots.forEach((s, i) => {
      if (!s) return
      indegree.set(i, s.incoming.size)
      if (s.incoming.size === 0) queue.push(i)
    })
    const order: number[] = []
    for (let head = 0; head < queue.length; head++) {
      const current = queue[head]
      order.push(current)
      for (const target of this.neighbors(current, 'outgoing')) {
        const remaining = (indegree.get(target) ?? 0) - 1
        indegree.set(target, remaining)
        if (remaining === 0) queue.push(target)
      }
    }
    return order
  }

  /** BFS from the root: index → hop count, in visiting order, stopping at `limit` hops. */
  private depths(limit = Infinity): Map<number, number> {
    const visited = new Map<number, number>([[this.rootIndex, 0]])
    const queue = [this.rootIndex]
    for (let head = 0; head < queue.length; head++) {
      const current = queue[head]
      const depth = visited.get(current) ?? 0
      if (depth >= limit) continue
      for (const target of this.neighbors(current, 'outgoing')) {
        if (visited.has(target)) continue
        visited.set(target, depth + 1)
        queue.push(target)
      }
    }
    return visited
  }

  private removeWhere(keep: { has(index: number): boolean }): number[] {
    const removed: number[] = []
    this.slots.forEach((s, i) => {
      if (s && !keep.has(i) && i !== this.stdIndex) removed.push(i)
    })
    for (const index of removed) this.detach(index)
    return removed
  }

  private detach(index: number): void {
    const s = this.slot(index)
    for (const target of s.outgoing.keys()) this.slots[target]?.incoming.delete(index)
    for (const source of s.incoming) this.slots[source]?.outgoing.delete(index)
    this.slots[index] = undefined
    this.live--
  }
}
