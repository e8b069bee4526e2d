export * from './spawn-and-collect.js'
