export * from './truncate.js'
