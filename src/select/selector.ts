import { AmbiguousSelectorError, UsageError } from '../errors/index.js'
import type { DependencyGraph } from '../graph/index.js'

/** How root and exclude patterns are matched against a crate's full name (`serde_json v1.0.120`). */
export type SelectorMode = 'prefix' | 'regex'

/**
 * In prefix mode a bare crate name (no space) first selects the crates with
 * exactly that short-name, so `serde` does not also pick `serde_derive`; only
 * when none exists does it match as a prefix of the full name.
 */
export function selectNodes(graph: DependencyGraph, pattern: string, mode: SelectorMode = 'prefix'): number[] {
  const indices = graph.nodeIndices()
  if (mode === 'prefix' && !pattern.includes(' ')) {
    const short = pattern.replace(/-/g, '_')
    const exact = indices.filter((i) => graph.node(i).short === short)
    if (exact.length > 0) return exact
  }
  const matches = matcher(pattern, mode)
  return indices.filter((i) => matches(graph.node(i).name))
}

/** The single crate matching `pattern`; anything else raises {@link AmbiguousSelectorError}. */
export function resolveRoot(graph: DependencyGraph, pattern: string, mode: SelectorMode = 'prefix'): number {
  const found = selectNodes(graph, pattern, mode)
  if (found.length !== 1) {
    throw new AmbiguousSelectorError(pattern, found.map((i) => graph.node(i).name))
  }
  return found[0]
}

/**
 * Indices of every crate matched by any of the patterns. A pattern that
 * matches nothing is an error; one that matches several crates selects them all.
 */
export function resolveExcludes(
  graph: DependencyGraph,
  patterns: readonly string[],
  mode: SelectorMode = 'prefix',
): number[] {
  const selected = new Set<number>()
  for (const pattern of patterns) {
    const found = selectNodes(graph, pattern, mode)
    if (found.length === 0) throw new AmbiguousSelectorError(pattern, [])
    for (const i of found) selected.add(i)
  }
  return [...selected].sort((a, b) => a - b)
}

function matcher(pattern: string, mode: SelectorMode): (name: string) => boolean {
  if (mode === 'prefix') {
    // crate names are stored with `_`; the version part is left as written
    const space = pattern.indexOf(' ')
    const head = space < 0 ? pattern : pattern.slice(0, space)
    const prefix = head.replace(/-/g, '_') + (space < 0 ? '' : pattern.slice(space))
    return (name) => name.startsWith(prefix)
  }
  let re: RegExp
  try {
    re = new RegExp(pattern)
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err)
    throw new UsageError(`invalid selector pattern "${pattern}": ${reason}`, { pattern })
  }
  return (name) => re.test(name)
}
