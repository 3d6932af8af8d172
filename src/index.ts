/**
 * cratemap: crate dependency graph with size and feature metadata
 *
 * Parses `cargo tree --edges=no-build,no-proc-macro,no-dev,features --prefix=depth`
 * output and a `cargo bloat --crates --message-format=json` report into a DAG,
 * reduces it (re-root, exclude, depth, size threshold) and computes per-crate
 * metrics for bloat analysis.
 *
 *   import { analyze } from 'cratemap'
 *   const { graph, values } = analyze(treeOutput, bloatOutput, { maxDepth: 3 })
 */

import './formats.js'

export * from './errors/index.js'
export * from './size/index.js'
export * from './graph/index.js'
export * from './tree/index.js'
export * from './metrics/index.js'
export * from './select/index.js'
export * from './config/index.js'
export * from './pipeline.js'
