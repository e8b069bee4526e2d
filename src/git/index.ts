export * from './parse-status.js'
export * from './query-status.js'
export type * from './types.js'
