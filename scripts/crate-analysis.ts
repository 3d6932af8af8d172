/**
 * Crate Bloat Analysis
 *
 * Pure analysis module — no Express/MCP dependencies.
 * Turns a reduced dependency graph into per-crate metrics, a summary,
 * duplicate-version findings, search results and dependency lookups
 * for the MCP server and the REST API.
 */

import {
  type DependencyGraph,
  UnknownNodeError,
  cumulativeSizes,
  dependencyCounts,
  formatFeatures,
  reverseDependencyCounts,
  type ColoringScheme,
} from "../src/index.js";

// ─── Types ───────────────────────────────────────────────────────

export interface CrateMetrics {
  index: number;
  name: string;
  short: string;
  extra: string;
  size: number;          // own bytes, 0 when the size report omits the crate
  cumSize: number;       // own + apportioned share of dependencies
  depCount: number;      // transitive dependency relations
  revDepCount: number;   // paths from the root
  fanIn: number;         // direct dependents
  fanOut: number;        // direct dependencies
  depth: number | null;  // hops from the root, null for std
}

export interface DuplicateCrate {
  short: string;
  versions: string[];
  indices: number[];
  combinedSize: number;
}

export interface ReportSummary {
  root: string;
  totalCrates: number;
  totalEdges: number;
  totalSize: number;
  maxDepth: number;
  unsizedCrates: number;
  duplicateCount: number;
}

export interface AnalysisReport {
  summary: ReportSummary;
  crates: CrateMetrics[];
  duplicates: DuplicateCrate[];
  generated: string;
}

export interface CrateLink {
  index: number;
  name: string;
  features: string;
}

export interface CrateDetail {
  metrics: CrateMetrics;
  features: string;
  dependencies: CrateLink[];
  dependents: CrateLink[];
}

// ─── Per-crate metrics ───────────────────────────────────────────

export function crateMetrics(graph: DependencyGraph): CrateMetrics[] {
  const cum = cumulativeSizes(graph);
  const deps = dependencyCounts(graph);
  const revDeps = reverseDependencyCounts(graph);
  const depth = graph.depthsFromRoot();

  return graph.nodeIndices().map((index) => {
    const crate = graph.node(index);
    return {
      index,
      name: crate.name,
      short: crate.short,
      extra: crate.extra,
      size: graph.size(index) ?? 0,
      cumSize: cum[index],
      depCount: deps[index],
      revDepCount: revDeps[index],
      fanIn: graph.neighbors(index, "incoming").length,
      fanOut: graph.neighbors(index, "outgoing").length,
      depth: depth.get(index) ?? null,
    };
  });
}

// ─── Duplicate versions ──────────────────────────────────────────

/** Crates compiled in more than one version, biggest combined size first. */
export function findDuplicates(graph: DependencyGraph): DuplicateCrate[] {
  const byShort = new Map<string, number[]>();
  for (const index of graph.nodeIndices()) {
    const short = graph.node(index).short;
    const list = byShort.get(short) ?? [];
    list.push(index);
    byShort.set(short, list);
  }

  const duplicates: DuplicateCrate[] = [];
  for (const [short, indices] of byShort) {
    if (indices.length < 2) continue;
    duplicates.push({
      short,
      versions: indices.map((i) => graph.node(i).extra),
      indices,
      combinedSize: indices.reduce((s, i) => s + (graph.size(i) ?? 0), 0),
    });
  }
  return duplicates.sort((a, b) => b.combinedSize - a.combinedSize || (a.short < b.short ? -1 : 1));
}

// ─── Report ──────────────────────────────────────────────────────

export function analyzeCrates(graph: DependencyGraph, generated: Date = new Date()): AnalysisReport {
  const crates = crateMetrics(graph);
  const duplicates = findDuplicates(graph);

  return {
    summary: {
      root: graph.node(graph.root).name,
      totalCrates: graph.nodeCount,
      totalEdges: graph.edgeCount,
      totalSize: crates.reduce((s, c) => s + c.size, 0),
      maxDepth: crates.reduce((m, c) => Math.max(m, c.depth ?? 0), 0),
      unsizedCrates: crates.filter((c) => graph.size(c.index) === undefined).length,
      duplicateCount: duplicates.length,
    },
    crates,
    duplicates,
    generated: generated.toISOString(),
  };
}

const SCHEME_FIELD: Record<ColoringScheme, "cumSize" | "depCount" | "revDepCount"> = {
  "cum-sum": "cumSize",
  "dep-count": "depCount",
  "rev-dep-count": "revDepCount",
};

/** Highest crates for a scheme; ties keep index order. */
export function topCrates(report: AnalysisReport, scheme: ColoringScheme, limit = 15): CrateMetrics[] {
  const field = SCHEME_FIELD[scheme];
  return [...report.crates].sort((a, b) => b[field] - a[field] || a.index - b.index).slice(0, limit);
}

// ─── Lookups ─────────────────────────────────────────────────────

/** Case-insensitive substring match on the full name; `-` in the query matches `_`. */
export function searchCrates(graph: DependencyGraph, query: string, limit = 20): CrateMetrics[] {
  const q = query.toLowerCase().replace(/-/g, "_");
  return crateMetrics(graph)
    .filter((c) => c.name.toLowerCase().replace(/-/g, "_").includes(q))
    .slice(0, limit);
}

export function crateDetail(graph: DependencyGraph, index: number): CrateDetail {
  const metrics = crateMetrics(graph).find((c) => c.index === index);
  if (!metrics) throw new UnknownNodeError(index);

  const link = (other: number, source: number, target: number): CrateLink => ({
    index: other,
    name: graph.node(other).name,
    features: formatFeatures(graph.edge(source, target).features),
  });

  return {
    metrics,
    features: formatFeatures(graph.node(index).features),
    dependencies: graph.neighbors(index, "outgoing").map((t) => link(t, index, t)),
    dependents: graph.neighbors(index, "incoming").map((s) => link(s, s, index)),
  };
}

/** Direct dependents, or with `transitive` every crate that reaches `index`, sorted by index. */
export function dependentsOf(graph: DependencyGraph, index: number, transitive = false): number[] {
  const direct = graph.neighbors(index, "incoming");
  if (!transitive) return [...direct].sort((a, b) => a - b);

  const visited = new Set<number>();
  const queue = [...direct];
  for (let head = 0; head < queue.length; head++) {
    const current = queue[head];
    if (visited.has(current)) continue;
    visited.add(current);
    for (const source of graph.neighbors(current, "incoming")) {
      if (!visited.has(source)) queue.push(source);
    }
  }
  return [...visited].sort((a, b) => a - b);
}
