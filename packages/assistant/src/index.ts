export * from './assistant'
export * from './composer/composer'
export * from './composer/definition'
export * from './composer/prompt'
export * from './config'
export * from './errors'
export * from './flow'
export * from './gateway'
export * from './model/gateway'
export * from './retrieval/passage-store'
export * from './retrieval/retriever'
export * from './retrieval/similarity'
export * from './server/app'
export * from './server/http'
export * from './session/session'
export * from './session/store'
export * from './visualization/chart'
export * from './visualization/extract'
export * from './visualization/intent'
export type * from './types'
