export * from './scheme.js'
export * from './values.js'
export * from './node-values.js'
