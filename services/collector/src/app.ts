// services/collector/src/app.ts
import Fastify, {
    type FastifyInstance,
    type FastifyServerOptions,
    type FastifyRequest,
    type FastifyReply,
} from 'fastify'
import cors from '@fastify/cors'

import {
    createLogger,
    makeClientBuffer,
    LogChannel,
    type ClientLogBuffer,
} from '@sunbridge/logging'

import { StateStore } from './core/state.js'
import { JsonFileEnergyStore } from './core/persistence/energyStore.js'
import type { TransportFactory } from './devices/micro-inverter/MicroInverterService.js'
import type { EnergyStore } from './devices/micro-inverter/types.js'
import wsPlugin from './plugins/ws.js'
import invertersPlugin from './plugins/inverters.js'
import inverterRoutes from './routes/inverters.js'

declare module 'fastify' {
    interface FastifyInstance {
        clientBuf: ClientLogBuffer
        appState: StateStore
    }
}

export const SERVICE_NAME = 'sunbridge-collector'
export const SERVICE_VERSION = '0.1.0'

export interface BuildAppOptions {
    fastify?: FastifyServerOptions
    /** Energy file and diagnostic dumps live here (env DATA_DIR, default ./data). */
    dataDir?: string
    /** Device entries; defaults to the ones built from process.env. */
    devices?: unknown[]
    store?: EnergyStore
    createTransport?: TransportFactory
    now?: () => number
    /** Start polling on ready (default true). */
    autoStart?: boolean
    clientBuf?: ClientLogBuffer
}

export function buildApp(opts: BuildAppOptions = {}): FastifyInstance {
    const clientBuf = opts.clientBuf ?? makeClientBuffer()
    const { channel } = createLogger('collector', clientBuf)
    const logApp = channel(LogChannel.app)
    const logReq = channel(LogChannel.request)

    // ---- Request logging config (env) ----
    const REQUEST_VERBOSE = String(process.env.REQUEST_VERBOSE ?? 'false').toLowerCase() === 'true'
    const REQUEST_SAMPLE = Math.max(1, Number(process.env.REQUEST_SAMPLE ?? '1') || 1)

    const dataDir = opts.dataDir ?? process.env.DATA_DIR ?? './data'
    const startedAt = new Map<string, number>()
    let reqCounter = 0

    const app = Fastify({ logger: false, ...opts.fastify })
    app.decorate('clientBuf', clientBuf)
    app.decorate('appState', new StateStore())

    void app.register(cors, { origin: true })

    void app.register(wsPlugin)
    void app.register(invertersPlugin, {
        devices: opts.devices,
        store: opts.store ?? new JsonFileEnergyStore(dataDir),
        createTransport: opts.createTransport,
        now: opts.now,
        autoStart: opts.autoStart,
    })
    void app.register(inverterRoutes, { dataDir })

    app.addHook('onReady', async () => {
        app.appState.setStatus('ready')
    })

    // ---------- Request/Response logging hooks ----------
    app.addHook('onRequest', async (req: FastifyRequest) => {
        if (++reqCounter % REQUEST_SAMPLE !== 0) return
        startedAt.set(req.id, Date.now())
        logReq.info(`${req.method} ${req.url}`)
        if (REQUEST_VERBOSE) logReq.debug('request detail', { id: req.id, ip: req.ip })
    })

    app.addHook('onResponse', async (req: FastifyRequest, reply: FastifyReply) => {
        const start = startedAt.get(req.id)
        if (start === undefined) return
        startedAt.delete(req.id)
        logReq.info(`${req.method} ${req.url} → ${reply.statusCode} (${Date.now() - start} ms)`)
    })
    // ---------------------------------------------------

    app.get('/health', async () => ({ status: 'ok' }))
    app.get('/version', async () => ({ name: SERVICE_NAME, version: SERVICE_VERSION }))

    logApp.info('collector app built')
    return app
}
