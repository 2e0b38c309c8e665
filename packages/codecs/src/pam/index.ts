export { decodePamPixels } from './decoder'
export { readPamHeader } from './header'
export * from './types'
