export * from './render.js'
export * from './themes.js'
export type * from './types.js'
