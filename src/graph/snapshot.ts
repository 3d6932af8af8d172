import { Type, type Static } from '@sinclair/typebox'
import type { DependencyGraph } from './graph.js'

const FeatureRecord = Type.Record(Type.String(), Type.Array(Type.String()), {
  description: 'Feature name → features it enables, keys in name order',
})

export const CrateSnapshot = Type.Object({
  index: Type.Integer({ minimum: 0 }),
  name: Type.String({ minLength: 1 }),
  short: Type.String({ minLength: 1 }),
  extra: Type.String(),
  size: Type.Union([Type.Integer({ minimum: 0 }), Type.Null()]),
  features: FeatureRecord,
}, { $id: 'CrateSnapshot', description: 'One crate of a dependency graph.' })

export type CrateSnapshot = Static<typeof CrateSnapshot>

export const EdgeSnapshot = Type.Object({
  source: Type.Integer({ minimum: 0 }),
  target: Type.Integer({ minimum: 0 }),
  features: FeatureRecord,
}, { $id: 'EdgeSnapshot', description: 'Dependency of source on target.' })

export type EdgeSnapshot = Static<typeof EdgeSnapshot>

export const GraphSnapshot = Type.Object({
  root: Type.Integer({ minimum: 0 }),
  std: Type.Union([Type.Integer({ minimum: 0 }), Type.Null()]),
  nodes: Type.Array(CrateSnapshot),
  edges: Type.Array(EdgeSnapshot),
  generated: Type.String({ format: 'date-time' }),
}, { $id: 'GraphSnapshot', description: 'Plain JSON form of a dependency graph. Node indices may be sparse.' })

export type GraphSnapshot = Static<typeof GraphSnapshot>

export function toSnapshot(graph: DependencyGraph, generated: Date = new Date()): GraphSnapshot {
  return {
    root: graph.root,
    std: graph.std ?? null,
    nodes: graph.nodeIndices().map((index) => {
      const crate = graph.node(index)
      return {
        index,
        name: crate.name,
        short: crate.short,
        extra: crate.extra,
        size: graph.size(index) ?? null,
        features: crate.features.toRecord(),
      }
    }),
    edges: graph.edges().map((e) => ({ source: e.source, target: e.target, features: e.features.toRecord() })),
    generated: generated.toISOString(),
  }
}
