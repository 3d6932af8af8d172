export * from './line.js'
export * from './parser.js'
