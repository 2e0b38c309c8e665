export { PnmCodec, loadPnm, readPnm } from './codec'
export { decodePnm, peekPnmHeader } from './decoder'
export { readPnmHeader } from './header'
export { TokenReader } from './tokenizer'
export * from './types'
