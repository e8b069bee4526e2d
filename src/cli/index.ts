export * from './args.js'
export * from './commands.js'
export * from './errors.js'
export * from './exit-codes.js'
export * from './handlers/git-prompt.js'
export * from './handlers/short-pwd.js'
export type * from './handlers/types.js'
export * from './help.js'
export * from './output.js'
export * from './parsers.js'
export * from './run.js'
export * from './validate-flags.js'
