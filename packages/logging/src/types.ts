// packages/logging/src/types.ts
import type { Logger } from 'pino'

export enum LogChannel {
    collector = 'collector',
    inverter = 'inverter',
    persistence = 'persistence',
    websocket = 'websocket',
    app = 'app',
    request = 'request',
}

export type ChannelColor = 'blue' | 'yellow' | 'magenta' | 'cyan' | 'purple'

/** Levels a channel logger exposes, lowest first. */
export const CLIENT_LOG_LEVELS = ['debug', 'info', 'warn', 'error', 'fatal'] as const

export type ClientLogLevel = (typeof CLIENT_LOG_LEVELS)[number]

/** Structured fields attached to a line, e.g. { deviceId }. */
export type LogContext = Record<string, unknown>

/** One log line as streamed to WebSocket clients. */
export interface ClientLog {
    ts: number
    service: string
    channel: LogChannel
    emoji: string
    color: ChannelColor
    level: ClientLogLevel
    message: string
    context?: LogContext
}

export type ClientLogListener = (log: ClientLog) => void

export interface ClientLogBuffer {
    push: (log: ClientLog) => void
    getLatest: (n: number) => ClientLog[]
    subscribe: (listener: ClientLogListener) => () => void
}

export type ChannelLogger = {
    [L in ClientLogLevel]: (msg: string, context?: LogContext) => void
}

export type ChannelPinoLogger = Logger<LogChannel, false>

export interface LoggerBundle {
    base: ChannelPinoLogger
    channel: (ch: LogChannel) => ChannelLogger
}
