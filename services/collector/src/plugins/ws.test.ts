import { promises as fs } from 'node:fs'
import os from 'node:os'
import path from 'node:path'

import { afterEach, beforeEach, describe, expect, it } from 'vitest'
import type { FastifyInstance } from 'fastify'
import type { RawData, WebSocket } from 'ws'

import { buildApp } from '../app.js'
import { MemoryEnergyStore } from '../core/persistence/energyStore.js'
import { FakeTransport } from '../testing/fakes.js'

type Frame = Record<string, unknown>

function isFrame(x: unknown): x is Frame {
    return x !== null && typeof x === 'object' && !Array.isArray(x)
}

/** Collects JSON frames from a socket and hands them out by type. */
class FrameLog {
    private readonly frames: Frame[] = []
    private waiters: { type: string; resolve: (frame: Frame) => void }[] = []

    attach(socket: WebSocket): void {
        socket.on('message', (data: RawData) => this.receive(data))
    }

    next(type: string): Promise<Frame> {
        const index = this.frames.findIndex(f => f.type === type)
        if (index >= 0) return Promise.resolve(this.frames.splice(index, 1)[0])
        return new Promise(resolve => this.waiters.push({ type, resolve }))
    }

    private receive(data: RawData): void {
        const buf = Array.isArray(data)
            ? Buffer.concat(data)
            : data instanceof ArrayBuffer ? Buffer.from(data) : data
        const msg: unknown = JSON.parse(buf.toString('utf8'))
        if (!isFrame(msg)) return

        const waiter = this.waiters.find(w => w.type === msg.type)
        if (waiter) {
            this.waiters = this.waiters.filter(w => w !== waiter)
            waiter.resolve(msg)
        } else {
            this.frames.push(msg)
        }
    }
}

describe('/ws', () => {
    let dataDir: string
    let app: FastifyInstance
    let socket: WebSocket | null = null

    beforeEach(async () => {
        dataDir = await fs.mkdtemp(path.join(os.tmpdir(), 'collector-ws-'))
        app = buildApp({
            dataDir,
            devices: [{ id: 'inv-1', host: '192.168.1.50', password: 'test-secret' }],
            store: new MemoryEnergyStore(),
            createTransport: () => new FakeTransport(),
            autoStart: false,
        })
        await app.ready()
    })

    afterEach(async () => {
        socket?.terminate()
        socket = null
        await app.close()
        await fs.rm(dataDir, { recursive: true, force: true })
    })

    async function connect(): Promise<FrameLog> {
        const log = new FrameLog()
        socket = await app.injectWS('/ws', {}, { onInit: ws => log.attach(ws) })
        return log
    }

    it('sends the full state on connect and patches after a tick', async () => {
        const log = await connect()

        expect(await log.next('welcome')).toMatchObject({ type: 'welcome', serverTime: expect.any(String) })

        const snapshot = await log.next('state.snapshot')
        const version = app.appState.version
        expect(snapshot).toMatchObject({
            stateVersion: version,
            data: {
                version,
                meta: { status: 'ready' },
                inverters: { 'inv-1': { deviceId: 'inv-1', available: false } },
            },
        })

        await app.inverters.require('inv-1').tick()

        const patch = await log.next('state.patch')
        expect(patch).toMatchObject({ fromVersion: version, toVersion: version + 1 })
        expect(patch.patch).toContainEqual({
            op: 'replace',
            path: '/inverters/inv-1/fields/power/value',
            value: 399,
        })
    })

    it('answers ping, hello and subscribe', async () => {
        const log = await connect()
        await log.next('state.snapshot')

        socket?.send(JSON.stringify({ type: 'ping' }))
        expect(await log.next('pong')).toMatchObject({ type: 'pong', ts: expect.any(Number) })

        socket?.send(JSON.stringify({ type: 'hello' }))
        expect(await log.next('ack')).toEqual({ type: 'ack', ok: true })

        socket?.send(JSON.stringify({ type: 'subscribe' }))
        expect(await log.next('state.snapshot')).toMatchObject({ stateVersion: app.appState.version })
    })
})
