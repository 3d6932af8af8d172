/**
 * Exports all TypeBox schemas to JSON Schema files in schemas/.
 * Schemas with $id use that as filename; others use the export name.
 * Run via: npm run schemas
 */
import { writeFileSync, mkdirSync } from 'node:fs'
import { dirname, join } from 'node:path'
import { fileURLToPath } from 'node:url'
import { Kind, type TSchema } from '@sinclair/typebox'

const __dirname = dirname(fileURLToPath(import.meta.url))
const SCHEMAS_DIR = join(__dirname, '..', 'schemas')

// Import all modules
import * as errors from '../src/errors/index.js'
import * as size from '../src/size/index.js'
import * as graph from '../src/graph/index.js'
import * as metrics from '../src/metrics/index.js'
import * as config from '../src/config/index.js'

const modules: Record<string, Record<string, unknown>> = {
  errors,
  size,
  graph,
  metrics,
  config,
}

function isSchema(value: unknown): value is TSchema {
  return typeof value === 'object' && value !== null && !Array.isArray(value) && Kind in value
}

let exportedCount = 0

for (const [moduleName, exports] of Object.entries(modules)) {
  for (const [exportName, schema] of Object.entries(exports)) {
    // Skip classes, functions and constants such as DEFAULT_GAMMA
    if (!isSchema(schema)) continue

    const id = typeof schema.$id === 'string' ? schema.$id : exportName
    const outSchema = { ...schema, $id: id }
    const outPath = join(SCHEMAS_DIR, moduleName, `${id}.json`)
    mkdirSync(dirname(outPath), { recursive: true })
    writeFileSync(outPath, JSON.stringify(outSchema, null, 2) + '\n')
    exportedCount++
  }
}

console.log(`[schemas] Exported ${exportedCount} schemas to ${SCHEMAS_DIR}`)
