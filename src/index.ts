/**
 * prompt-segments public API
 */

export * from './cli/index.js'
export * from './config/index.js'
export * from './decoration/index.js'
export * from './errors.js'
export * from './git/index.js'
export * from './logger/index.js'
export * from './path/index.js'
export * from './spawn/index.js'
