export * from './report.js'
export * from './table.js'
