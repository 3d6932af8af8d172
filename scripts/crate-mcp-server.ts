/**
 * Crate Bloat MCP Server (Streamable HTTP)
 *
 * Exposes a reduced crate dependency graph via MCP tools and a small
 * REST API. Reads a dependency listing and a size report from disk at
 * start-up, runs the analysis pipeline, and serves the results.
 *
 * Inputs:
 *   CRATEMAP_TREE    dependency listing (cargo tree output with depth prefix)
 *   CRATEMAP_SIZES   size report JSON ({"crates":[{"name","size"}]})
 *   CRATEMAP_CONFIG  optional JSON file of analysis options
 *   PORT             HTTP port (default 3200)
 *
 * MCP client config:
 *   "mcpServers": {
 *     "crates": { "type": "http", "url": "http://localhost:3200/mcp" }
 *   }
 */

import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StreamableHTTPServerTransport } from "@modelcontextprotocol/sdk/server/streamableHttp.js";
import { isInitializeRequest } from "@modelcontextprotocol/sdk/types.js";
import { z } from "zod";
import { readFileSync, existsSync } from "node:fs";
import { resolve } from "node:path";
import { randomUUID } from "node:crypto";
import express from "express";
import cors from "cors";

import {
  CratemapError,
  UnknownNodeError,
  analyze,
  toSnapshot,
  SCHEME_LABELS,
  type Analysis,
} from "../src/index.js";

import {
  analyzeCrates,
  crateDetail,
  dependentsOf,
  searchCrates,
  topCrates,
  type AnalysisReport,
} from "./crate-analysis.js";

// ─── Inputs ──────────────────────────────────────────────────────

interface Inputs {
  tree: string;
  sizes: string;
  options: unknown;
}

function readInput(variable: string): string {
  const path = process.env[variable];
  if (!path) throw new Error(`${variable} is not set`);
  const file = resolve(path);
  if (!existsSync(file)) throw new Error(`${variable}: ${file} not found`);
  console.log(`[crate-mcp] Loaded ${variable} from ${file}`);
  return readFileSync(file, "utf-8");
}

function readInputs(): Inputs {
  const tree = readInput("CRATEMAP_TREE");
  const sizes = readInput("CRATEMAP_SIZES");
  const options: unknown = process.env.CRATEMAP_CONFIG ? JSON.parse(readInput("CRATEMAP_CONFIG")) : {};
  return { tree, sizes, options };
}

// ─── State ───────────────────────────────────────────────────────

interface State {
  analysis: Analysis;
  report: AnalysisReport;
}

let inputs: Inputs | null = null;
let state: State | null = null;

function run(options: unknown): State {
  if (!inputs) inputs = readInputs();
  console.log(`[crate-mcp] Running crate analysis...`);
  const analysis = analyze(inputs.tree, inputs.sizes, options);
  const report = analyzeCrates(analysis.graph);
  console.log(
    `[crate-mcp] Analysis complete: ${report.summary.totalCrates} crates, ${report.summary.totalEdges} edges, ` +
      `${analysis.removed.length} removed, ${report.summary.duplicateCount} duplicated`
  );
  return { analysis, report };
}

function load(): State {
  if (!state) {
    if (!inputs) inputs = readInputs();
    state = run(inputs.options);
  }
  return state;
}

// ─── Tool helpers ────────────────────────────────────────────────

function text(value: unknown) {
  return { content: [{ type: "text" as const, text: JSON.stringify(value, null, 2) }] };
}

function failure(e: unknown) {
  if (e instanceof CratemapError) return { ...text({ error: e.toJSON() }), isError: true };
  throw e;
}

// ─── MCP tools ───────────────────────────────────────────────────

function registerTools(server: McpServer): void {
  // crate_stats
  server.tool(
    "crate_stats",
    "Summary of the analysed dependency graph: crate and edge counts, total size, depth, duplicated crates, and the heaviest crates by cumulative size",
    {},
    async () => {
      const { analysis, report } = load();
      return text({
        ...report.summary,
        scheme: analysis.options.scheme,
        removed: analysis.removed.length,
        topByCumulativeSize: topCrates(report, "cum-sum", 10).map((c) => ({ index: c.index, name: c.name, cumSize: c.cumSize })),
        generated: report.generated,
      });
    }
  );

  // crate_search
  server.tool(
    "crate_search",
    "Search crates by name or version. Returns matching crates with their metrics.",
    {
      query: z.string().describe("Search term (matches against the full crate name, e.g. 'serde v1')"),
      limit: z.number().int().optional().describe("Max results (default 20)"),
    },
    async ({ query, limit }) => {
      const { analysis } = load();
      const results = searchCrates(analysis.graph, query, limit ?? 20);
      return text({ matches: results.length, results });
    }
  );

  // crate_detail
  server.tool(
    "crate_detail",
    "Full details for one crate: metrics, enabled features, direct dependencies and dependents with the features each edge enables.",
    { index: z.number().int().describe("Node index of the crate (from crate_search)") },
    async ({ index }) => {
      try {
        return text(crateDetail(load().analysis.graph, index));
      } catch (e) {
        return failure(e);
      }
    }
  );

  // crate_top
  server.tool(
    "crate_top",
    "Rank crates by one coloring metric: cumulative size, dependency count, or reverse dependency count.",
    {
      scheme: z.enum(["cum-sum", "dep-count", "rev-dep-count"]).describe("Metric to rank by"),
      limit: z.number().int().optional().describe("Max results (default 15)"),
    },
    async ({ scheme, limit }) => {
      const { report } = load();
      return text({ scheme, label: SCHEME_LABELS[scheme], crates: topCrates(report, scheme, limit ?? 15) });
    }
  );

  // crate_dependents
  server.tool(
    "crate_dependents",
    "Which crates pull in a given crate, directly or transitively.",
    {
      index: z.number().int().describe("Node index of the crate"),
      transitive: z.boolean().optional().describe("Include indirect dependents (default false)"),
    },
    async ({ index, transitive }) => {
      try {
        const { graph } = load().analysis;
        const dependents = dependentsOf(graph, index, transitive ?? false).map((i) => ({ index: i, name: graph.node(i).name }));
        return text({ crate: graph.node(index).name, transitive: transitive ?? false, count: dependents.length, dependents });
      } catch (e) {
        return failure(e);
      }
    }
  );

  // crate_duplicates
  server.tool(
    "crate_duplicates",
    "Crates compiled in more than one version, with their combined size.",
    {},
    async () => {
      const { report } = load();
      return text({ count: report.duplicates.length, duplicates: report.duplicates });
    }
  );

  // crate_reanalyze
  server.tool(
    "crate_reanalyze",
    "Re-run the analysis on the loaded inputs with new options (root, excludes, depth, threshold, scheme). Replaces the current results.",
    {
      root: z.string().optional().describe("Crate to use as the new root (prefix or regex)"),
      excludes: z.array(z.string()).optional().describe("Crates to remove together with what only they pull in"),
      selector: z.enum(["prefix", "regex"]).optional().describe("How root and excludes match crate names (default prefix)"),
      maxDepth: z.number().int().min(0).optional().describe("Keep crates at most this many edges below the root"),
      threshold: z.string().optional().describe("Remove crates whose cumulative size is below this, e.g. '21KiB', '4096', 'non-zero'"),
      std: z.boolean().optional().describe("Add a standalone node for the standard library"),
      bin: z.string().optional().describe("Binary name whose size entry is merged into the root crate"),
      scheme: z.enum(["cum-sum", "dep-count", "rev-dep-count", "none"]).optional().describe("Coloring metric"),
      gamma: z.number().min(0).max(1).optional().describe("Gamma of the color gradient"),
      highlight: z.enum(["dep", "rev-dep"]).optional().describe("Compute highlight classes for hovering"),
    },
    async ({ threshold, ...rest }) => {
      try {
        const parsed = threshold !== undefined && /^\d+$/.test(threshold) ? Number(threshold) : threshold;
        state = run({ ...rest, ...(parsed !== undefined ? { threshold: parsed } : {}) });
        return text({ summary: state.report.summary, removed: state.analysis.removed.length });
      } catch (e) {
        return failure(e);
      }
    }
  );
}

// --- Create MCP server factory (one per session) ---
function createMcpServer(): McpServer {
  const server = new McpServer({ name: "cratemap", version: "0.1.0" });
  registerTools(server);
  return server;
}

// ─── HTTP Server ─────────────────────────────────────────────────

const app = express();
app.use(cors());
app.use(express.json());

app.get("/health", (_req, res) => {
  const { analysis, report } = load();
  res.json({
    status: "ok",
    service: "crate-mcp-server",
    version: "0.1.0",
    graph: { crates: report.summary.totalCrates, edges: report.summary.totalEdges, root: report.summary.root },
    options: analysis.options,
    generated: report.generated,
  });
});

app.get("/api/graph", (_req, res) => {
  const { analysis } = load();
  const { graph, values, classes } = analysis;
  const indices = graph.nodeIndices();
  res.json({
    snapshot: toSnapshot(graph),
    coloring: values
      ? {
          scheme: values.scheme,
          gamma: values.gamma,
          max: values.max,
          outputs: indices.map((i) => ({ index: i, value: values.value(i), output: values.output(i) })),
        }
      : null,
    highlight: classes ? indices.map((i) => ({ index: i, classes: classes[i] })) : null,
  });
});

app.get("/api/analysis", (_req, res) => {
  res.json(load().report);
});

app.get("/api/crates/:index", (req, res) => {
  const index = Number(req.params.index);
  if (!Number.isInteger(index) || index < 0) {
    res.status(400).json({ error: `Invalid crate index "${req.params.index}"` });
    return;
  }
  try {
    res.json(crateDetail(load().analysis.graph, index));
  } catch (e) {
    if (e instanceof UnknownNodeError) {
      res.status(404).json({ error: e.toJSON() });
      return;
    }
    if (e instanceof CratemapError) {
      res.status(400).json({ error: e.toJSON() });
      return;
    }
    throw e;
  }
});

// Store active transports
const transports: Record<string, StreamableHTTPServerTransport> = {};

// =============================================================
// Streamable HTTP transport — /mcp
// =============================================================
app.all("/mcp", async (req, res) => {
  const header = req.headers["mcp-session-id"];
  const sessionId = typeof header === "string" ? header : undefined;
  let transport: StreamableHTTPServerTransport;

  if (sessionId && transports[sessionId]) {
    transport = transports[sessionId];
  } else if (!sessionId && req.method === "POST" && isInitializeRequest(req.body)) {
    transport = new StreamableHTTPServerTransport({
      sessionIdGenerator: () => randomUUID(),
      onsessioninitialized: (sid) => {
        console.log(`[crate-mcp] StreamableHTTP session: ${sid}`);
        transports[sid] = transport;
      },
    });
    transport.onclose = () => {
      const sid = transport.sessionId;
      if (sid && transports[sid]) delete transports[sid];
    };
    const server = createMcpServer();
    await server.connect(transport);
  } else {
    res.status(400).json({ jsonrpc: "2.0", error: { code: -32000, message: "No valid session" }, id: null });
    return;
  }

  await transport.handleRequest(req, res, req.body);
});

// --- Start ---
const PORT = parseInt(process.env.PORT || "3200", 10);

// Pre-load inputs so a bad listing fails at start-up
try {
  load();
} catch (e) {
  console.error(`[crate-mcp] Failed to load: ${e instanceof Error ? e.message : String(e)}`);
  process.exit(1);
}

app.listen(PORT, () => {
  console.log(`[crate-mcp] HTTP server listening on port ${PORT}`);
  console.log(`[crate-mcp] Graph:      http://localhost:${PORT}/api/graph`);
  console.log(`[crate-mcp] Analysis:   http://localhost:${PORT}/api/analysis`);
  console.log(`[crate-mcp] Health:     http://localhost:${PORT}/health`);
  console.log(`[crate-mcp] MCP:        http://localhost:${PORT}/mcp`);
});

process.on("SIGINT", async () => {
  for (const sid in transports) {
    try {
      await transports[sid].close();
    } catch (e) {
      console.warn(`[crate-mcp] Failed to close session ${sid}:`, e);
    }
    delete transports[sid];
  }
  process.exit(0);
});
