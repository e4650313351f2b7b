export * from './analysis'
export * from './context'
export * from './errors'
export * from './evaluator'
export * from './flow'
export * from './logger'
export * from './node'
export * from './runtime/executors'
export * from './runtime/runtime'
export type * from './types'
