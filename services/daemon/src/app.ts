import Fastify, {
    type FastifyInstance,
    type FastifyServerOptions,
    type FastifyRequest,
    type FastifyReply
} from 'fastify'
import cors from '@fastify/cors'

import {
    createLogger,
    makeClientBuffer,
    LogChannel,
    type ClientLogBuffer
} from '@lidwatch/logging'

import lidSwitchPlugin, { type LidSwitchPluginOptions } from './plugins/lidSwitch.js'
import buttonsPlugin, { type ButtonsPluginOptions } from './plugins/buttons.js'
import hotkeyPlugin from './plugins/hotkey.js'
import hedPlugin, { type HedPluginOptions } from './plugins/hed.js'
import powerPlugin from './plugins/power.js'
import tinyPowerButtonPlugin, { type TinyPowerButtonPluginOptions } from './plugins/tinyPowerButton.js'
import { getSnapshot, setStatus } from './core/state.js'

declare module 'fastify' {
    interface FastifyInstance {
        clientBuf: ClientLogBuffer
    }
}

interface LogsQuery {
    n?: string
}

export interface BuildAppOptions {
    server?: FastifyServerOptions
    lid?: LidSwitchPluginOptions
    buttons?: ButtonsPluginOptions
    hed?: HedPluginOptions
    tinyPowerButton?: TinyPowerButtonPluginOptions
    clock?: () => number
    clientBuf?: ClientLogBuffer
}

// ---- Request logging config (env) ----
const REQUEST_VERBOSE = String(process.env.REQUEST_VERBOSE ?? 'false').toLowerCase() === 'true'
const REQUEST_SAMPLE = Math.max(1, Number(process.env.REQUEST_SAMPLE ?? '1'))
// --------------------------------------

let reqCounter = 0

export function buildApp(opts: BuildAppOptions = {}): FastifyInstance {
    const clientBuf = opts.clientBuf ?? makeClientBuffer()
    const { channel } = createLogger('daemon', clientBuf)
    const logApp = channel(LogChannel.app)
    const logReq = channel(LogChannel.request)

    const startedAt = new Map<string, number>()

    const app = Fastify({ logger: false, ...opts.server })
    app.decorate('clientBuf', clientBuf)

    void app.register(cors, { origin: true })

    // Device plugins; power fans suspend/resume out to the others
    void app.register(lidSwitchPlugin, { clock: opts.clock, ...opts.lid })
    void app.register(buttonsPlugin, { clock: opts.clock, ...opts.buttons })
    void app.register(hotkeyPlugin, { clock: opts.clock })
    void app.register(hedPlugin, { clock: opts.clock, ...opts.hed })
    void app.register(tinyPowerButtonPlugin, { clock: opts.clock, ...opts.tinyPowerButton })
    void app.register(powerPlugin)

    // ---------- Request/Response logging hooks ----------
    app.addHook('onRequest', async (req: FastifyRequest) => {
        const shouldLog = ++reqCounter % REQUEST_SAMPLE === 0
        if (!shouldLog) return

        startedAt.set(req.id, Date.now())
        logReq.debug(`${req.method} ${req.url}`)
    })

    app.addHook('onResponse', async (req: FastifyRequest, reply: FastifyReply) => {
        const start = startedAt.get(req.id)
        if (start === undefined) return
        startedAt.delete(req.id)

        const ms = Date.now() - start
        logReq.debug(`${req.method} ${req.url} → ${reply.statusCode} (${ms} ms)`)

        if (REQUEST_VERBOSE) {
            const outLen = reply.getHeader('content-length') ?? null
            logReq.debug('response detail', { id: req.id, bytesOut: outLen, ms })
        }
    })
    // ---------------------------------------------------

    app.addHook('onReady', async () => {
        setStatus('ready')
    })

    // Health / state
    app.get('/health', async () => ({ status: 'ok' }))
    app.get('/version', async () => ({ name: 'lidwatch-daemon', version: '0.1.0' }))
    app.get('/api/state', async () => getSnapshot())

    app.get<{ Querystring: LogsQuery }>('/api/logs', async (req) => {
        const n = Number(req.query.n ?? 100)
        return { logs: clientBuf.getLatest(Number.isFinite(n) ? n : 100) }
    })

    logApp.info('daemon app built')
    return app
}
