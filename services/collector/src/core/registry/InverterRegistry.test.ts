import { afterEach, describe, expect, it, vi } from 'vitest'

import { ConfigurationError, DuplicateDeviceError, UnknownDeviceError } from '../errors.js'
import { MemoryEnergyStore } from '../persistence/energyStore.js'
import {
    FakeTransport,
    ManualClock,
    PendingTransport,
    RecordingSink,
    REFUSED,
} from '../../testing/fakes.js'
import { InverterRegistry, type RegistryChange } from './InverterRegistry.js'

function setup(transport = new FakeTransport()) {
    const clock = new ManualClock()
    const sink = new RecordingSink()
    const registry = new InverterRegistry({
        events: sink,
        store: new MemoryEnergyStore(),
        createTransport: () => transport,
        now: clock.now,
    })
    const changes: RegistryChange[] = []
    registry.onChange(change => changes.push(change))
    return { clock, sink, registry, changes, transport }
}

const ENTRY = { id: 'inv-1', host: '192.168.1.50', password: 'test-secret' }

describe('InverterRegistry', () => {
    afterEach(() => {
        vi.useRealTimers()
    })

    it('registers a device and announces its initial snapshot', async () => {
        const { registry, changes } = setup()

        const service = await registry.add(ENTRY)

        expect(service.describe()).toEqual({
            id: 'inv-1',
            host: '192.168.1.50',
            username: 'admin',
            updateIntervalSec: 30,
        })
        expect(registry.get('inv-1')).toBe(service)
        expect(changes).toHaveLength(1)
        expect(changes[0]).toMatchObject({ kind: 'data', snapshot: { deviceId: 'inv-1', available: false } })
        expect(service.isRunning).toBe(false)
    })

    it('derives an id from the host when none is given', async () => {
        const { registry } = setup()
        const service = await registry.add({ host: '10.0.0.7' })
        expect(service.id).toBe('inverter-10_0_0_7')
    })

    it('rejects a duplicate id', async () => {
        const { registry } = setup()
        await registry.add(ENTRY)

        await expect(registry.add({ ...ENTRY, host: '192.168.1.51' })).rejects.toBeInstanceOf(DuplicateDeviceError)
        expect(registry.list()).toHaveLength(1)
    })

    it('rejects an invalid entry without registering it', async () => {
        const { registry } = setup()

        await expect(registry.add({ host: 'inverter.local' })).rejects.toBeInstanceOf(ConfigurationError)
        expect(registry.list()).toEqual([])
    })

    it('forwards every published snapshot', async () => {
        const { registry, changes } = setup()
        const service = await registry.add(ENTRY)

        await service.tick()

        expect(changes).toHaveLength(2)
        const last = changes[1]
        expect(last.kind).toBe('data')
        if (last.kind === 'data') expect(last.snapshot.fields.power.value).toBe(399)
        expect(registry.snapshots().map(s => s.deviceId)).toEqual(['inv-1'])
    })

    it('removes a device and stops listening to it', async () => {
        const { registry, changes } = setup()
        const service = await registry.add(ENTRY)

        await registry.remove('inv-1')
        await service.tick()

        expect(changes.map(c => c.kind)).toEqual(['data', 'removed'])
        expect(() => registry.require('inv-1')).toThrow(UnknownDeviceError)
        await expect(registry.remove('inv-1')).rejects.toThrow('unknown inverter "inv-1"')
    })

    it('updates settings through the device', async () => {
        const { registry } = setup()
        await registry.add(ENTRY)

        expect(registry.update('inv-1', { updateIntervalSec: 60 }).updateIntervalSec).toBe(60)
        expect(() => registry.update('inv-2', {})).toThrow(UnknownDeviceError)
    })

    it('starts and stops every device, including ones added while running', async () => {
        vi.useFakeTimers({ toFake: ['setTimeout', 'clearTimeout'] })
        const { registry } = setup()
        const first = await registry.add(ENTRY)

        await registry.startAll()
        const second = await registry.add({ id: 'inv-2', host: '192.168.1.51' })

        expect(first.isRunning).toBe(true)
        expect(second.isRunning).toBe(true)

        await registry.stopAll()
        expect(first.isRunning).toBe(false)
        expect(second.isRunning).toBe(false)
        expect(vi.getTimerCount()).toBe(0)
    })

    it('isolates a throwing change listener', async () => {
        const { registry, sink, changes } = setup()
        registry.onChange(() => {
            throw new Error('subscriber broke')
        })

        await registry.add(ENTRY)

        expect(changes).toHaveLength(1)
        expect(sink.ofKind('listener-error')).toMatchObject([{ deviceId: 'inv-1', error: 'subscriber broke' }])
    })

    it('keeps devices independent while one fetch hangs', async () => {
        const clock = new ManualClock()
        const sink = new RecordingSink()
        const slow = new PendingTransport()
        const fast = new FakeTransport()
        const registry = new InverterRegistry({
            events: sink,
            store: new MemoryEnergyStore(),
            createTransport: cfg => (cfg.id === 'slow' ? slow : fast),
            now: clock.now,
        })
        const first = await registry.add({ id: 'slow', host: '192.168.1.50' })
        const second = await registry.add({ id: 'fast', host: '192.168.1.51' })

        const pending = first.tick()
        const published = await second.tick()

        expect(slow.waiting).toBe(1)
        expect(published).toMatchObject({ deviceId: 'fast', available: true, status: 'healthy' })
        expect(published.fields.power).toMatchObject({ value: 399, source: 'fresh' })
        expect(first.getSnapshot()).toMatchObject({ available: false, status: 'offline', consecutiveFailures: 0 })
        expect(first.getSnapshot().fields.power).toEqual({ value: 0, lastUpdatedAt: null, source: 'default' })
        expect(sink.ofKind('snapshot-published').map(e => e.deviceId)).toEqual(['fast'])

        slow.release()
        const late = await pending
        expect(late.fields.power.value).toBe(399)
        expect(second.getSnapshot()).toBe(published)
    })

    describe('probe', () => {
        it('reads the page once and reports the parsed fields', async () => {
            const { registry, transport } = setup()

            const result = await registry.probe(ENTRY)

            expect(result).toMatchObject({
                ok: true,
                deviceId: 'inv-1',
                fields: { power: 399, energyToday: 0.5, energyTotal: 381.5, serialNumber: 'SN-TEST-0001' },
            })
            expect(transport.calls).toHaveLength(1)
            expect(registry.list()).toEqual([])
        })

        it('reports a transport failure', async () => {
            const { registry } = setup(new FakeTransport(REFUSED))
            expect(await registry.probe(ENTRY)).toEqual({ ok: false, deviceId: 'inv-1', failure: REFUSED })
        })

        it('reports a page that is not a status page', async () => {
            const { registry } = setup(new FakeTransport('<html></html>'))
            expect(await registry.probe(ENTRY)).toEqual({
                ok: false,
                deviceId: 'inv-1',
                failure: { kind: 'malformed', message: 'missing webdata_now_p' },
            })
        })
    })
})
