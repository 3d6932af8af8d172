export * from './types.js'
export * from './features.js'
export * from './graph.js'
export * from './snapshot.js'
