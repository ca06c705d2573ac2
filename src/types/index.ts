export type * from './manifest.js'
export type * from './scan.js'
export type * from './pipeline.js'
