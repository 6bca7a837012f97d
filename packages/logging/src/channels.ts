import { type ChannelColor, LogChannel } from './types.js'

export const CHANNEL_AS_LEVEL = true as const

export const CHANNELS: Record<LogChannel, { emoji: string, color: ChannelColor }> = {
    [LogChannel.collector]:   { emoji: '🛰️', color: 'blue' },
    // One channel for every micro-inverter coordinator
    [LogChannel.inverter]:    { emoji: '☀️', color: 'yellow' },
    [LogChannel.persistence]: { emoji: '💾', color: 'magenta' },
    [LogChannel.websocket]:   { emoji: '🔗', color: 'cyan' },
    [LogChannel.app]:         { emoji: '📦', color: 'blue' },
    [LogChannel.request]:     { emoji: '📝', color: 'purple' },
}

export const ANSI: Record<ChannelColor, string> = {
    blue: '\x1b[34m',
    yellow: '\x1b[33m',
    magenta: '\x1b[35m',
    cyan: '\x1b[36m',
    purple: '\x1b[95m' // bright magenta (purple-ish)
}

export const RESET = '\x1b[0m'

// pino rejects custom levels that reuse a built-in value, so channels sit
// just above info (30) and below warn (40).
export const CUSTOM_LEVELS: Record<LogChannel, number> = {
    [LogChannel.collector]:   31,
    [LogChannel.inverter]:    32,
    [LogChannel.persistence]: 33,
    [LogChannel.websocket]:   34,
    [LogChannel.app]:         35,
    [LogChannel.request]:     36,
}

export function isLogChannel(value: unknown): value is LogChannel {
    return typeof value === 'string' && Object.prototype.hasOwnProperty.call(CHANNELS, value)
}
