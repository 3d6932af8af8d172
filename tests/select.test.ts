import { describe, it, expect } from 'vitest'
import {
  AmbiguousSelectorError,
  DependencyGraph,
  UsageError,
  resolveExcludes,
  resolveRoot,
  selectNodes,
} from '../src/index.js'

// app → serde 1, app → serde_json → serde 0.9
const graph = DependencyGraph.from(
  [
    { short: 'app', extra: 'v0.1.0' },
    { short: 'serde', extra: 'v1.0.0' },
    { short: 'serde_json', extra: 'v1.0.100' },
    { short: 'serde', extra: 'v0.9.0' },
  ],
  [{ source: 0, target: 1 }, { source: 0, target: 2 }, { source: 2, target: 3 }],
)

describe('selectNodes', () => {
  it('matches full names by prefix', () => {
    expect(selectNodes(graph, 'ser')).toEqual([1, 2, 3])
    expect(selectNodes(graph, 'serde ')).toEqual([1, 3])
    expect(selectNodes(graph, 'serde v1')).toEqual([1])
  })

  it('matches a bare crate name exactly before falling back to a prefix', () => {
    expect(selectNodes(graph, 'serde')).toEqual([1, 3])
    expect(selectNodes(graph, 'serde_j')).toEqual([2])
    expect(selectNodes(graph, 'serde', 'regex')).toEqual([1, 2, 3])
  })

  it('treats hyphens in the crate name as underscores', () => {
    expect(selectNodes(graph, 'serde-json')).toEqual([2])
    expect(selectNodes(graph, 'serde-json v1.0.100')).toEqual([2])
  })

  it('matches by regular expression', () => {
    expect(selectNodes(graph, '^serde v', 'regex')).toEqual([1, 3])
    expect(selectNodes(graph, 'json', 'regex')).toEqual([2])
  })

  it('rejects an invalid regular expression', () => {
    expect(() => selectNodes(graph, '(', 'regex')).toThrow(UsageError)
  })
})

describe('resolveRoot', () => {
  it('returns the single match', () => {
    expect(resolveRoot(graph, 'serde_json')).toBe(2)
  })

  it('lists every match when there are several', () => {
    try {
      resolveRoot(graph, 'serde')
      expect.unreachable()
    } catch (err) {
      expect(err).toBeInstanceOf(AmbiguousSelectorError)
      if (err instanceof AmbiguousSelectorError) {
        expect(err.matches).toEqual(['serde v1.0.0', 'serde v0.9.0'])
        expect(err.code).toBe('AMBIGUOUS_SELECTOR')
      }
    }
  })

  it('fails when nothing matches', () => {
    expect(() => resolveRoot(graph, 'tokio')).toThrow('no crate matches "tokio"')
  })
})

describe('resolveExcludes', () => {
  it('unions the matches of every pattern', () => {
    expect(resolveExcludes(graph, ['serde v0', 'serde_json'])).toEqual([2, 3])
  })

  it('removes every crate a pattern matches', () => {
    expect(resolveExcludes(graph, ['serde'])).toEqual([1, 3])
    expect(resolveExcludes(graph, ['ser'])).toEqual([1, 2, 3])
  })

  it('fails on a pattern that matches nothing', () => {
    expect(() => resolveExcludes(graph, ['serde', 'tokio'])).toThrow(AmbiguousSelectorError)
  })
})
