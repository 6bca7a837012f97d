export * from './types.js'
export { createLogger } from './pino.js'
export { makeClientBuffer } from './buffer.js'
export { CHANNELS, isLogChannel } from './channels.js'
