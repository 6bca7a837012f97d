// services/collector/src/plugins/ws.ts
import fp from 'fastify-plugin'
import websocket from '@fastify/websocket'
import type { FastifyInstance, FastifyRequest } from 'fastify'
import type { RawData, WebSocket as WSSocket } from 'ws'
import {
    createLogger,
    LogChannel,
    type ClientLog,
    type ClientLogLevel,
} from '@sunbridge/logging'

import { errorMessage } from '../core/errors.js'
import type { AppState, PatchEvent } from '../core/state.js'

// ---------------------------
// Log filtering configuration
// ---------------------------
const LEVEL_ORDER: Record<ClientLogLevel, number> = {
    debug: 10,
    info: 20,
    warn: 30,
    error: 40,
    fatal: 50,
}

function isLevel(value: string): value is ClientLogLevel {
    return Object.prototype.hasOwnProperty.call(LEVEL_ORDER, value)
}

const LOGS_SNAPSHOT_DEFAULT = 200

export interface WsPluginOptions {
    /** Lowest client log level streamed to sockets (env LOG_LEVEL_MIN, default debug). */
    minLevel?: ClientLogLevel
    /** Log entries sent on connect (env CLIENT_LOGS_SNAPSHOT, default 200). */
    logsSnapshot?: number
}

function isRecord(x: unknown): x is Record<string, unknown> {
    return x !== null && typeof x === 'object' && !Array.isArray(x)
}

function parseMessage(data: RawData): Record<string, unknown> | null {
    const buf = Array.isArray(data)
        ? Buffer.concat(data)
        : data instanceof ArrayBuffer ? Buffer.from(data) : data
    const text = buf.toString('utf8')
    try {
        const msg: unknown = JSON.parse(text)
        return isRecord(msg) ? msg : null
    } catch {
        return null
    }
}

export default fp<WsPluginOptions>(async function wsPlugin(app: FastifyInstance, opts: WsPluginOptions) {
    const clientBuf = app.clientBuf
    const state = app.appState

    const { channel } = createLogger('collector:ws', clientBuf)
    const logWs = channel(LogChannel.websocket)

    const envMin = (process.env.LOG_LEVEL_MIN ?? '').toLowerCase()
    const minLevel: ClientLogLevel = opts.minLevel ?? (isLevel(envMin) ? envMin : 'debug')
    const snapshotCount = Math.max(
        0,
        opts.logsSnapshot ?? Number(process.env.CLIENT_LOGS_SNAPSHOT ?? LOGS_SNAPSHOT_DEFAULT)
    )

    const allowLog = (e: ClientLog): boolean =>
        // websocket channel entries are never streamed back to sockets
        e.channel !== LogChannel.websocket && LEVEL_ORDER[e.level] >= LEVEL_ORDER[minLevel]

    await app.register(websocket, {
        options: {
            perMessageDeflate: true,
            clientTracking: true,
        },
    })

    const sockets = new Set<WSSocket>()

    const broadcast = (payload: string) => {
        for (const ws of sockets) {
            if (ws.readyState !== ws.OPEN) continue
            try {
                ws.send(payload)
            } catch (err) {
                logWs.debug('send failed', { err: errorMessage(err) })
            }
        }
    }

    const snapshotFrame = (snap: AppState) =>
        JSON.stringify({
            type: 'state.snapshot',
            stateVersion: snap.version,
            data: snap,
        })

    // Live logs -> filter -> broadcast
    const unsubscribeLogs = clientBuf.subscribe((entry: ClientLog) => {
        if (!allowLog(entry)) return
        broadcast(JSON.stringify({ type: 'logs.append', entries: [entry] }))
    })

    // Handler signature: (socket, request)
    app.get('/ws', { websocket: true }, (socket: WSSocket, _req: FastifyRequest) => {
        sockets.add(socket)

        try {
            socket.send(
                JSON.stringify({
                    type: 'welcome',
                    serverTime: new Date().toISOString(),
                })
            )
            socket.send(snapshotFrame(state.getSnapshot()))

            if (snapshotCount > 0) {
                const entries = clientBuf.getLatest(snapshotCount).filter(allowLog)
                if (entries.length > 0) {
                    socket.send(JSON.stringify({ type: 'logs.history', entries }))
                }
            }

            logWs.info('client connected')
        } catch (e) {
            logWs.error('failed to send initial frames', { err: errorMessage(e) })
        }

        socket.on('message', (data: RawData) => {
            const msg = parseMessage(data)
            if (!msg) return

            if (msg.type === 'hello') {
                socket.send(JSON.stringify({ type: 'ack', ok: true }))
                return
            }

            if (msg.type === 'ping') {
                socket.send(JSON.stringify({ type: 'pong', ts: Date.now() }))
                return
            }

            // Resync after the client noticed a version gap.
            if (msg.type === 'subscribe') {
                socket.send(snapshotFrame(state.getSnapshot()))
                return
            }
        })

        socket.on('close', () => {
            sockets.delete(socket)
            logWs.info('client disconnected')
        })
    })

    // --- Broadcast state changes: incremental patches ---
    const unsubscribePatches = state.onPatch((evt: PatchEvent) => {
        broadcast(
            JSON.stringify({
                type: 'state.patch',
                fromVersion: evt.from,
                toVersion: evt.to,
                patch: evt.patch,
            })
        )
    })

    app.addHook('onClose', async () => {
        unsubscribePatches()
        unsubscribeLogs()
        for (const ws of sockets) {
            ws.terminate()
        }
        sockets.clear()
    })
}, {
    name: 'ws-plugin',
})
