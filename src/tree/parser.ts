import { MalformedInputError, UsageError } from '../errors/index.js'
import { DependencyGraph } from '../graph/index.js'
import { readTreeLine } from './line.js'

interface Frame {
  node: number
  /** Feature of `node` being expanded below this frame. */
  feature: string | undefined
}

const ONE_PACKAGE = 'one and only one package must be specified'

/**
 * Builds a dependency graph from the output of
 * `cargo tree --edges=no-build,no-proc-macro,no-dev,features --prefix=depth --color=never`.
 *
 * The listing is flat; nesting is carried by the depth prefix, so parsing is a
 * stack machine over `(node, feature)` frames rather than recursion. In feature
 * mode a crate shows up as
 *
 * ```text
 * 1serde feature "default"
 * 2serde v1.0.0
 * 2serde feature "std"
 * 3serde v1.0.0
 * ```
 *
 * i.e. a feature header followed, one level deeper, by the crate it belongs
 * to. That second line sits at the header's depth + 1 without opening a new
 * level of its own. A repeated header ending in `(*)` points back at the
 * crate expanded under the first one.
 */
export function parseTree(text: string): DependencyGraph {
  const lines = splitLines(text)
  if (lines.length === 0) throw new UsageError(ONE_PACKAGE)

  const graph = new DependencyGraph()
  const nodes = new Map<string, number>()
  const expanded = new Map<string, number>()
  const stack: Frame[] = []

  let lastNode: number | undefined
  let activeFeature: string | undefined
  let isFeatureFirst = false

  lines.forEach((raw, i) => {
    const lineNo = i + 1
    // cargo separates the trees of several root packages with a blank line
    if (raw.length === 0) throw new UsageError(ONE_PACKAGE, { line: lineNo })

    const line = readTreeLine(raw, lineNo)
    if (line.depth === 0 && lastNode !== undefined) throw new UsageError(ONE_PACKAGE, { line: lineNo })

    if (line.depth > stack.length + 1) {
      throw new MalformedInputError(`depth ${line.depth} skips a level below depth ${stack.length}`, lineNo, raw)
    }
    if (line.depth < stack.length) {
      stack.length = line.depth
    } else if (line.depth === stack.length + 1 && !isFeatureFirst) {
      if (lastNode === undefined) throw new MalformedInputError('nested entry before any crate', lineNo, raw)
      stack.push({ node: lastNode, feature: activeFeature })
    }

    if (line.kind === 'feature') {
      activeFeature = line.feature
      if (line.backReference) {
        const node = expanded.get(featureKey(line.short, line.feature))
        if (node === undefined) {
          throw new MalformedInputError(`feature "${line.feature}" of ${line.short} was never expanded`, lineNo, raw)
        }
        attach(graph, stack, node, activeFeature)
      } else {
        isFeatureFirst = true
      }
      return
    }

    let node = nodes.get(line.key)
    if (node === undefined) {
      node = graph.addNode(line.short, line.extra)
      nodes.set(line.key, node)
    }

    if (isFeatureFirst && activeFeature !== undefined) {
      expanded.set(featureKey(line.short, activeFeature), node)
      const features = graph.node(node).features
      features.enable(activeFeature)

      // A feature "i"
      // |- A
      // |- A feature "j"
      //    |- A
      // feature "i" of A turns on its own feature "j"
      const top = stack.at(-1)
      if (top && top.node === node && top.feature !== undefined) {
        features.append(top.feature, activeFeature)
      }
    } else {
      activeFeature = undefined
    }

    attach(graph, stack, node, activeFeature)

    lastNode = node
    if (isFeatureFirst) {
      stack.push({ node, feature: activeFeature })
      activeFeature = undefined
    }
    isFeatureFirst = false
  })

  if (!graph.isAcyclic()) throw new MalformedInputError('listing re-enters one of its own ancestors')
  return graph
}

/**
 * Links `node` under the frame on top of the stack.
 *
 * ```text
 * A feature "i"
 * |- A
 * |- B feature "j"
 *    |- B
 * ```
 * records `i → [j]` on the edge A → B: feature "i" of A enables feature "j" of B.
 */
function attach(graph: DependencyGraph, stack: readonly Frame[], node: number, feature: string | undefined): void {
  const top = stack.at(-1)
  if (!top || top.node === node) return
  const edge = graph.addEdge(top.node, node)
  if (top.feature !== undefined && feature !== undefined) edge.features.append(top.feature, feature)
}

function featureKey(short: string, feature: string): string {
  return `${short}\u0000${feature}`
}

function splitLines(text: string): string[] {
  if (text.length === 0) return []
  const lines = text.split('\n').map((l) => (l.endsWith('\r') ? l.slice(0, -1) : l))
  while (lines.length > 0 && lines[lines.length - 1] === '') lines.pop()
  return lines
}
