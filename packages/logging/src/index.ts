export { createLogger } from './pino'
export { makeClientBuffer } from './buffer'
export { CHANNELS } from './channels'
export {
    LogChannel,
    type ChannelColor,
    type ChannelLogger,
    type ClientLog,
    type ClientLogBuffer,
    type ClientLogLevel,
    type ClientLogListener,
    type LoggerBundle
} from './types'
