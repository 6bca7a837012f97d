// packages/logging/src/pino.ts
import pino, { type LoggerOptions } from 'pino'
import pinoPretty from 'pino-pretty'

import { ANSI, CHANNELS, CHANNEL_AS_LEVEL, CUSTOM_LEVELS, RESET, isLogChannel } from './channels.js'
import {
    LogChannel,
    type ChannelLogger,
    type ChannelPinoLogger,
    type ClientLogBuffer,
    type ClientLogLevel,
    type LogContext,
    type LoggerBundle,
} from './types.js'

interface LoggerEnv {
    pretty: boolean
    level: string
}

/** Read on every call so tests and dotenv can change it after import. */
function readLoggerEnv(): LoggerEnv {
    return {
        pretty: String(process.env.PRETTY_LOGS ?? 'true').toLowerCase() === 'true',
        level: process.env.LOG_LEVEL ?? 'info',
    }
}

function channelPrefix(ch: LogChannel): string {
    const meta = CHANNELS[ch]
    return `${ANSI[meta.color]}${meta.emoji} [${ch}]:${RESET}`
}

/**
 * Build the collector's loggers.
 *
 * Every line goes to pino (pretty-printed unless PRETTY_LOGS=false) with a
 * coloured channel prefix, and, when a client buffer is given, to that buffer
 * for the WebSocket log feed. `info` lines are written at the channel's own
 * custom level so pino-pretty can tell channels apart.
 */
export function createLogger(service: string, clientBuf?: ClientLogBuffer): LoggerBundle {
    const env = readLoggerEnv()

    let base: ChannelPinoLogger

    const options: LoggerOptions<LogChannel, false> = {
        level: env.level,
        base: { service },
        customLevels: CUSTOM_LEVELS,
        useOnlyCustomLevels: false,
        formatters: {
            level() { return { lvl: '' } },      // suppress textual level in JSON
            log(obj) { return obj }
        },
        hooks: {
            logMethod(args, method) {
                const first: unknown = args[0]
                if (typeof first === 'object' && first !== null && 'channel' in first) {
                    const ch = first.channel
                    if (isLogChannel(ch) && typeof args[1] === 'string') {
                        args[1] = `${channelPrefix(ch)} ${args[1]}`
                    }
                }
                method.apply(base, args)
            }
        }
    }

    base = env.pretty
        ? pino(options, pinoPretty({
            translateTime: 'SYS:standard',
            colorize: true,
            singleLine: false,
            ignore: 'pid,hostname,service,channel,lvl'
        }))
        : pino(options)

    const fanout = (ch: LogChannel, level: ClientLogLevel, message: string, context?: LogContext): void => {
        if (!clientBuf) return
        const meta = CHANNELS[ch]
        clientBuf.push({
            ts: Date.now(),
            service,
            channel: ch,
            emoji: meta.emoji,
            color: meta.color,
            level,
            message,
            ...(context ? { context } : {}),
        })
    }

    const write = (ch: LogChannel, level: ClientLogLevel, message: string, context?: LogContext): void => {
        const obj = context ? { channel: ch, ...context } : { channel: ch }
        if (level === 'info' && CHANNEL_AS_LEVEL) base[ch](obj, message)
        else base[level](obj, message)
        fanout(ch, level, message, context)
    }

    const channel = (ch: LogChannel): ChannelLogger => ({
        debug: (msg, context) => write(ch, 'debug', msg, context),
        info: (msg, context) => write(ch, 'info', msg, context),
        warn: (msg, context) => write(ch, 'warn', msg, context),
        error: (msg, context) => write(ch, 'error', msg, context),
        fatal: (msg, context) => write(ch, 'fatal', msg, context),
    })

    return { base, channel }
}
