export * from './errors'
export * from './format'
export * from './pixels'
export type * from './types'
