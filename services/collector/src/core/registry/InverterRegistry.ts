// services/collector/src/core/registry/InverterRegistry.ts

import { DuplicateDeviceError, UnknownDeviceError, errorMessage } from '../errors.js'
import {
    MicroInverterService,
    type PublicInverterConfig,
    type TransportFactory,
} from '../../devices/micro-inverter/MicroInverterService.js'
import { extractStatusFields } from '../../devices/micro-inverter/statusPage.js'
import {
    FIELD_CATEGORIES,
    type DeviceSnapshot,
    type EnergyStore,
    type FetchFailure,
    type FieldMap,
    type InverterEventSink,
} from '../../devices/micro-inverter/types.js'
import { validateInverterConfig } from '../../devices/micro-inverter/utils.js'

export interface InverterRegistryDeps {
    events: InverterEventSink
    store: EnergyStore
    createTransport: TransportFactory
    now?: () => number
}

export type RegistryChange =
    | { kind: 'data'; snapshot: DeviceSnapshot }
    | { kind: 'removed'; deviceId: string }

export type ProbeResult =
    | { ok: true; deviceId: string; fields: FieldMap }
    | { ok: false; deviceId: string; failure: FetchFailure }

export type RegistryListener = (change: RegistryChange) => void

/**
 * One independent coordinator per configured inverter. Devices share
 * nothing but the event sink and the energy store.
 */
export class InverterRegistry {
    private readonly deps: InverterRegistryDeps
    private readonly services = new Map<string, MicroInverterService>()
    private readonly unsubscribers = new Map<string, () => void>()
    private readonly listeners = new Set<RegistryListener>()
    private started = false

    constructor(deps: InverterRegistryDeps) {
        this.deps = deps
    }

    /**
     * Validate and register a device. It starts polling at once when the
     * registry is already running.
     */
    async add(input: unknown): Promise<MicroInverterService> {
        const config = validateInverterConfig(input)
        if (this.services.has(config.id)) {
            throw new DuplicateDeviceError(config.id)
        }

        const service = new MicroInverterService(config, {
            events: this.deps.events,
            store: this.deps.store,
            createTransport: this.deps.createTransport,
            now: this.deps.now,
        })
        this.services.set(config.id, service)
        this.unsubscribers.set(
            config.id,
            service.onNewData(snapshot => this.notify({ kind: 'data', snapshot }))
        )
        this.notify({ kind: 'data', snapshot: service.getSnapshot() })

        if (this.started) await service.start()
        return service
    }

    get(id: string): MicroInverterService | undefined {
        return this.services.get(id)
    }

    require(id: string): MicroInverterService {
        const service = this.services.get(id)
        if (!service) throw new UnknownDeviceError(id)
        return service
    }

    list(): MicroInverterService[] {
        return [...this.services.values()]
    }

    snapshots(): DeviceSnapshot[] {
        return this.list().map(s => s.getSnapshot())
    }

    update(id: string, patch: unknown): PublicInverterConfig {
        return this.require(id).updateSettings(patch)
    }

    async remove(id: string): Promise<void> {
        const service = this.require(id)
        this.services.delete(id)
        this.unsubscribers.get(id)?.()
        this.unsubscribers.delete(id)
        await service.stop()
        this.notify({ kind: 'removed', deviceId: id })
    }

    async startAll(): Promise<void> {
        this.started = true
        await Promise.all(this.list().map(s => s.start()))
    }

    async stopAll(): Promise<void> {
        this.started = false
        await Promise.all(this.list().map(s => s.stop()))
    }

    /**
     * One-off connection test for a device entry that is not registered:
     * validates it, reads the status page once and reports what came back.
     */
    async probe(input: unknown): Promise<ProbeResult> {
        const config = validateInverterConfig(input)
        const transport = this.deps.createTransport(config)
        const result = await transport.fetchStatus(FIELD_CATEGORIES)
        if (!result.ok) return { ok: false, deviceId: config.id, failure: result.failure }

        const extracted = extractStatusFields(result.body)
        if (!extracted.ok) return { ok: false, deviceId: config.id, failure: extracted.failure }
        return { ok: true, deviceId: config.id, fields: extracted.fields }
    }

    onChange(listener: RegistryListener): () => void {
        this.listeners.add(listener)
        return () => {
            this.listeners.delete(listener)
        }
    }

    private notify(change: RegistryChange): void {
        for (const listener of [...this.listeners]) {
            try {
                listener(change)
            } catch (err) {
                this.deps.events.publish({
                    kind: 'listener-error',
                    at: (this.deps.now ?? Date.now)(),
                    deviceId: change.kind === 'data' ? change.snapshot.deviceId : change.deviceId,
                    error: errorMessage(err),
                })
            }
        }
    }
}
