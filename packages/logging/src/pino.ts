import pino, { type Logger, type LoggerOptions, type LogFn } from 'pino'
import pinoPretty from 'pino-pretty'
import {
    type ClientLogLevel,
    type LoggerBundle,
    type ChannelLogger,
    type ClientLogBuffer,
    LogChannel
} from './types'
import { CHANNELS, ANSI, RESET, CUSTOM_LEVELS, CHANNEL_AS_LEVEL } from './channels'

// Extend pino's options to include levelKey (present at runtime, missing in the typings)
type PinoOptionsExt = LoggerOptions<LogChannel> & { levelKey?: string }

const KNOWN_CHANNELS = new Set<string>(Object.values(LogChannel))

function isLogChannel(v: unknown): v is LogChannel {
    return typeof v === 'string' && KNOWN_CHANNELS.has(v)
}

function channelOf(arg: unknown): LogChannel | undefined {
    if (typeof arg !== 'object' || arg === null || !('channel' in arg)) return undefined
    return isLogChannel(arg.channel) ? arg.channel : undefined
}

export function createLogger(service: string, clientBuf?: ClientLogBuffer): LoggerBundle {
    const PRETTY = String(process.env.PRETTY_LOGS ?? 'true').toLowerCase() === 'true'
    const LOG_LEVEL = process.env.LOG_LEVEL ?? 'info'

    let base: Logger<LogChannel>

    const options: PinoOptionsExt = {
        levelKey: 'lvl',                          // hide default 'level' from pino-pretty
        level: LOG_LEVEL,
        base: { service },
        customLevels: CUSTOM_LEVELS,
        useOnlyCustomLevels: false,
        formatters: {
            level() { return { lvl: '' } },      // suppress textual level in JSON
            log(obj) { return obj }
        },
        hooks: {
            logMethod(args: unknown[], method: LogFn): void {
                const ch = args.length > 0 ? channelOf(args[0]) : undefined

                if (ch) {
                    const meta = CHANNELS[ch]
                    const prefix = `${ANSI[meta.color]}${meta.emoji} [${ch}]:${RESET}`

                    if (args.length >= 2 && typeof args[1] === 'string') {
                        args[1] = `${prefix} ${args[1]}`
                    } else if (args.length >= 1 && typeof args[0] === 'string') {
                        args[0] = `${prefix} ${args[0]}`
                    } else {
                        args.push(prefix)
                    }
                }

                Reflect.apply(method, base, args)
            }
        }
    }

    const destination = PRETTY
        ? pinoPretty({
            translateTime: 'SYS:standard', // [YYYY-MM-DD HH:mm:ss.SSS +0000]
            colorize: true,
            singleLine: false,
            // keep these ignored fields out of output
            ignore: 'pid,hostname,service,channel,lvl'
        })
        : undefined

    base = destination ? pino<LogChannel>(options, destination) : pino<LogChannel>(options)

    const fanout = (channel: LogChannel, level: ClientLogLevel, message: string): void => {
        if (!clientBuf) return
        const meta = CHANNELS[channel]
        clientBuf.push({
            ts: Date.now(),
            channel,
            emoji: meta.emoji,
            color: meta.color,
            level,
            message
        })
    }

    const fields = (ch: LogChannel, extra?: Record<string, unknown>): Record<string, unknown> =>
        extra ? { channel: ch, ...extra } : { channel: ch }

    const channel = (ch: LogChannel): ChannelLogger => ({
        debug: (msg: string, extra?: Record<string, unknown>): void => {
            base.debug(fields(ch, extra), msg)
            fanout(ch, 'debug', msg)
        },
        info: (msg: string, extra?: Record<string, unknown>): void => {
            if (CHANNEL_AS_LEVEL) {
                base[ch](fields(ch, extra), msg)
            } else {
                base.info(fields(ch, extra), msg)
            }
            fanout(ch, 'info', msg)
        },
        warn: (msg: string, extra?: Record<string, unknown>): void => {
            base.warn(fields(ch, extra), msg)
            fanout(ch, 'warn', msg)
        },
        error: (msg: string, extra?: Record<string, unknown>): void => {
            base.error(fields(ch, extra), msg)
            fanout(ch, 'error', msg)
        },
        fatal: (msg: string, extra?: Record<string, unknown>): void => {
            base.fatal(fields(ch, extra), msg)
            fanout(ch, 'fatal', msg)
        }
    })

    return { base, channel }
}
