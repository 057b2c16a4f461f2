import { type ChannelColor, LogChannel } from './types'

export const CHANNEL_AS_LEVEL = true as const

export const CHANNELS: Record<LogChannel, { emoji: string, color: ChannelColor }> = {
    [LogChannel.daemon]:  { emoji: '🛰️', color: 'blue' },
    [LogChannel.app]:     { emoji: '📦', color: 'blue' },
    [LogChannel.request]: { emoji: '📝', color: 'purple' },
    // Lid switch engine
    [LogChannel.lid]:     { emoji: '💻', color: 'cyan' },
    // Power/sleep button relay
    [LogChannel.button]:  { emoji: '🔘', color: 'yellow' },
    [LogChannel.hed]:     { emoji: '🚨', color: 'red' },
    [LogChannel.hotkey]:  { emoji: '📶', color: 'magenta' },
    [LogChannel.power]:   { emoji: '🔋', color: 'green' },
}

export const ANSI: Record<ChannelColor, string> = {
    blue: '\x1b[34m',
    yellow: '\x1b[33m',
    green: '\x1b[32m',
    magenta: '\x1b[35m',
    cyan: '\x1b[36m',
    red: '\x1b[31m',
    white: '\x1b[37m',
    purple: '\x1b[95m' // bright magenta (purple-ish)
}

export const RESET = '\x1b[0m'

// pino rejects custom levels that reuse a built-in value, so channels sit just above info (30)
export const CUSTOM_LEVELS: Record<LogChannel, number> = {
    [LogChannel.daemon]:  31,
    [LogChannel.app]:     32,
    [LogChannel.request]: 33,
    [LogChannel.lid]:     34,
    [LogChannel.button]:  35,
    [LogChannel.hed]:     36,
    [LogChannel.hotkey]:  37,
    [LogChannel.power]:   38,
}
