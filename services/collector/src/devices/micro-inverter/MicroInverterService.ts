// services/collector/src/devices/micro-inverter/MicroInverterService.ts

import fs from 'node:fs/promises'
import path from 'node:path'

import { errorMessage } from '../../core/errors.js'
import { applyFetchOutcome, createFailureState } from './failureTracker.js'
import {
    categoryIntervals,
    dueCategories,
    nextTickDelayMs,
    tickIntervalMs,
    type CategoryIntervals,
} from './freshness.js'
import { extractStatusFields } from './statusPage.js'
import {
    FIELD_CATEGORIES,
    type DeviceSnapshot,
    type EnergyStore,
    type FailureState,
    type FetchFailure,
    type FetchOutcome,
    type FieldCategory,
    type InverterDeviceConfig,
    type InverterEvent,
    type InverterEventSink,
    type InverterTransport,
    type PersistedEnergy,
} from './types.js'
import { validateSettingsPatch } from './utils.js'
import { ValueCache } from './valueCache.js'

export type TransportFactory = (config: InverterDeviceConfig) => InverterTransport
export type NewDataListener = (snapshot: DeviceSnapshot) => void

export interface MicroInverterServiceDeps {
    events: InverterEventSink
    store: EnergyStore
    createTransport: TransportFactory
    /** Clock in epoch ms; tests drive it by hand. */
    now?: () => number
}

/** Device config as exposed outside the service (no password). */
export type PublicInverterConfig = Omit<InverterDeviceConfig, 'password'>

export type DumpResult =
    | { ok: true; filePath: string; bytes: number }
    | { ok: false; failure: FetchFailure }

type LastFetchTable = Record<FieldCategory, number | null>

function emptyFetchTable(): LastFetchTable {
    return { power: null, energy: null, wifi: null, device: null }
}

/** Snapshots are shared by every reader and listener. */
function freezeSnapshot(snapshot: DeviceSnapshot): DeviceSnapshot {
    for (const field of Object.values(snapshot.fields)) Object.freeze(field)
    Object.freeze(snapshot.fields)
    if (snapshot.lastFailure) Object.freeze(snapshot.lastFailure)
    return Object.freeze(snapshot)
}

/**
 * MicroInverterService
 *
 * Polls one micro-inverter's status page on a fixed cadence and keeps a
 * complete, always-available view of it:
 *
 * - Each tick asks the freshness policy which categories are due and makes
 *   at most one request on behalf of all of them.
 * - A successful read is written into the value cache (energy is persisted
 *   before the tick completes) and resets the failure tracker.
 * - A failed read (transport or parse) only bumps the failure tracker; the
 *   cache is left alone, so the published values are the last known good.
 * - Every tick, due or not, ends by publishing a snapshot and notifying
 *   onNewData listeners. The next tick is scheduled after that.
 *
 * Ticks never throw. stop() aborts an in-flight request; whatever it
 * returns afterwards is discarded.
 */
export class MicroInverterService {
    private config: InverterDeviceConfig
    private readonly deps: MicroInverterServiceDeps
    private readonly now: () => number

    private transport: InverterTransport
    private intervals: CategoryIntervals
    private cache: ValueCache
    private failure: FailureState
    private lastFetchAt: LastFetchTable = emptyFetchTable()
    private lastSuccessAt: number | null = null
    private lastFailure: (FetchFailure & { at: number }) | null = null
    private snapshot: DeviceSnapshot

    private readonly listeners = new Set<NewDataListener>()

    private running = false
    /** Bumped by stop(); work started under an older generation is dropped. */
    private generation = 0
    private abort: AbortController | null = null
    private timer: NodeJS.Timeout | null = null
    private inFlight: Promise<DeviceSnapshot> | null = null

    constructor(config: InverterDeviceConfig, deps: MicroInverterServiceDeps) {
        this.config = { ...config }
        this.deps = deps
        this.now = deps.now ?? Date.now

        this.transport = deps.createTransport(this.config)
        this.intervals = categoryIntervals(this.config.updateIntervalSec)
        this.cache = new ValueCache()
        this.failure = createFailureState(this.config.id)
        this.snapshot = this.buildSnapshot(this.now())
    }

    get id(): string {
        return this.config.id
    }

    get isRunning(): boolean {
        return this.running
    }

    describe(): PublicInverterConfig {
        const { password: _password, ...rest } = this.config
        return rest
    }

    /* ---------------------------------------------------------------------- */
    /*  Lifecycle                                                             */
    /* ---------------------------------------------------------------------- */

    /**
     * Restore persisted energy, then run the first tick right away. A store
     * that cannot be read is reported and the device starts from defaults.
     */
    async start(): Promise<void> {
        if (this.running) return
        this.running = true
        this.abort = new AbortController()
        const generation = this.generation

        let restored: PersistedEnergy | null = null
        try {
            restored = await this.deps.store.load(this.config.id)
        } catch (err) {
            this.emit({
                kind: 'persistence-error',
                at: this.now(),
                deviceId: this.config.id,
                op: 'load',
                error: errorMessage(err),
            })
        }

        if (generation !== this.generation) return

        this.cache = new ValueCache(restored)
        this.snapshot = this.buildSnapshot(this.now())

        this.emit({
            kind: 'inverter-started',
            at: this.now(),
            deviceId: this.config.id,
            host: this.config.host,
            updateIntervalSec: this.config.updateIntervalSec,
            restored,
        })

        this.schedule(0)
    }

    async stop(): Promise<void> {
        if (!this.running) return
        this.running = false
        this.generation += 1
        this.clearTimer()
        this.abort?.abort()
        this.abort = null
        this.inFlight = null

        this.emit({ kind: 'inverter-stopped', at: this.now(), deviceId: this.config.id })
    }

    /* ---------------------------------------------------------------------- */
    /*  Read path                                                             */
    /* ---------------------------------------------------------------------- */

    /** Latest published snapshot. It is frozen; copy it before changing anything. */
    getSnapshot(): DeviceSnapshot {
        return this.snapshot
    }

    onNewData(listener: NewDataListener): () => void {
        this.listeners.add(listener)
        return () => {
            this.listeners.delete(listener)
        }
    }

    /* ---------------------------------------------------------------------- */
    /*  Tick                                                                  */
    /* ---------------------------------------------------------------------- */

    /**
     * Run one cycle now. Overlapping calls share the cycle already running.
     * Resolves with the snapshot the cycle published.
     */
    tick(): Promise<DeviceSnapshot> {
        if (this.inFlight) return this.inFlight
        const run = this.runTick().finally(() => {
            if (this.inFlight === run) this.inFlight = null
        })
        this.inFlight = run
        return run
    }

    private async runTick(): Promise<DeviceSnapshot> {
        const generation = this.generation
        const startedAt = this.now()
        const due = dueCategories(this.lastFetchAt, startedAt, this.intervals)

        try {
            if (due.length > 0) {
                await this.fetchDue(due, startedAt, generation)
            }
        } catch (err) {
            // Collaborators are expected to resolve; anything else still ends in a publish.
            this.recordFailure({ kind: 'unreachable', message: errorMessage(err) }, due, startedAt)
        }

        if (generation !== this.generation) return this.snapshot
        return this.publish(due)
    }

    private async fetchDue(due: FieldCategory[], startedAt: number, generation: number): Promise<void> {
        const signal = this.abort?.signal
        const result = await this.transport.fetchStatus(due, signal)
        if (generation !== this.generation) return

        if (!result.ok) {
            this.recordFailure(result.failure, due, startedAt)
            return
        }

        const extracted = extractStatusFields(result.body)
        if (!extracted.ok) {
            this.recordFailure(extracted.failure, due, startedAt)
            return
        }

        for (const category of due) {
            const { rejected } = this.cache.update(category, extracted.fields, startedAt)
            this.lastFetchAt[category] = startedAt
            for (const r of rejected) {
                this.emit({
                    kind: 'energy-value-rejected',
                    at: startedAt,
                    deviceId: this.config.id,
                    field: r.field,
                    fetched: r.fetched,
                    kept: r.kept,
                })
            }
        }

        this.lastSuccessAt = startedAt
        this.applyOutcome({ ok: true }, startedAt)

        this.emit({
            kind: 'fetch-succeeded',
            at: startedAt,
            deviceId: this.config.id,
            categories: due,
            durationMs: Math.max(0, this.now() - startedAt),
        })

        if (due.includes('energy')) {
            await this.persistEnergy(startedAt)
        }
    }

    private async persistEnergy(at: number): Promise<void> {
        const record = this.cache.energyRecord(at)
        try {
            await this.deps.store.save(this.config.id, record)
            this.emit({ kind: 'energy-persisted', at, deviceId: this.config.id, record })
        } catch (err) {
            this.emit({
                kind: 'persistence-error',
                at,
                deviceId: this.config.id,
                op: 'save',
                error: errorMessage(err),
            })
        }
    }

    private recordFailure(failure: FetchFailure, due: FieldCategory[], at: number): void {
        this.lastFailure = { ...failure, at }
        this.applyOutcome({ ok: false, failure }, at)
        this.emit({
            kind: 'fetch-failed',
            at,
            deviceId: this.config.id,
            categories: due,
            failure,
            consecutiveFailures: this.failure.consecutiveFailures,
        })
    }

    private applyOutcome(outcome: FetchOutcome, at: number): void {
        const prev = this.failure
        const next = applyFetchOutcome(prev, outcome)
        this.failure = next

        if (prev.isAvailable !== next.isAvailable || prev.status !== next.status) {
            this.emit({
                kind: 'availability-changed',
                at,
                deviceId: this.config.id,
                available: next.isAvailable,
                status: next.status,
                consecutiveFailures: next.consecutiveFailures,
            })
        }
    }

    private publish(due: FieldCategory[]): DeviceSnapshot {
        const takenAt = this.now()
        const snapshot = this.buildSnapshot(takenAt)
        this.snapshot = snapshot
        this.cache.settle()

        this.emit({
            kind: 'snapshot-published',
            at: takenAt,
            deviceId: this.config.id,
            dueCategories: due,
        })

        for (const listener of [...this.listeners]) {
            try {
                listener(snapshot)
            } catch (err) {
                this.emit({
                    kind: 'listener-error',
                    at: takenAt,
                    deviceId: this.config.id,
                    error: errorMessage(err),
                })
            }
        }

        return snapshot
    }

    private buildSnapshot(takenAt: number): DeviceSnapshot {
        return freezeSnapshot({
            deviceId: this.config.id,
            host: this.config.host,
            takenAt,
            available: this.failure.isAvailable,
            status: this.failure.status,
            consecutiveFailures: this.failure.consecutiveFailures,
            lastSuccessAt: this.lastSuccessAt,
            lastFailure: this.lastFailure ? { ...this.lastFailure } : null,
            fields: this.cache.snapshotFields(),
        })
    }

    /* ---------------------------------------------------------------------- */
    /*  Scheduling                                                            */
    /* ---------------------------------------------------------------------- */

    get tickMs(): number {
        return tickIntervalMs(this.intervals)
    }

    private schedule(delayMs: number): void {
        this.clearTimer()
        this.timer = setTimeout(() => {
            this.timer = null
            void this.runScheduled()
        }, delayMs)
    }

    private async runScheduled(): Promise<void> {
        await this.tick()
        this.scheduleIfIdle()
    }

    private scheduleIfIdle(): void {
        if (this.running && this.timer === null && this.inFlight === null) {
            this.schedule(nextTickDelayMs(this.lastFetchAt, this.now(), this.intervals))
        }
    }

    private clearTimer(): void {
        if (this.timer) {
            clearTimeout(this.timer)
            this.timer = null
        }
    }

    /* ---------------------------------------------------------------------- */
    /*  Settings                                                              */
    /* ---------------------------------------------------------------------- */

    /**
     * Change host, credentials or interval of a running device. Validation
     * happens before anything changes. A new interval restarts the wait:
     * the next tick runs one full interval after the change, or, when a tick
     * is in flight, one interval after it publishes.
     */
    updateSettings(input: unknown): PublicInverterConfig {
        const patch = validateSettingsPatch(input)
        const prev = this.config
        const next: InverterDeviceConfig = { ...prev, ...patch }

        const hostChanged = next.host !== prev.host
        const credentialsChanged = next.username !== prev.username || next.password !== prev.password
        const intervalChanged = next.updateIntervalSec !== prev.updateIntervalSec

        this.config = next
        if (hostChanged || credentialsChanged) {
            this.transport = this.deps.createTransport(next)
        }

        if (intervalChanged) {
            this.intervals = categoryIntervals(next.updateIntervalSec)
            if (this.running) {
                this.clearTimer()
                if (this.inFlight) {
                    void this.inFlight.then(() => this.scheduleIfIdle())
                } else {
                    this.schedule(this.tickMs)
                }
            }
        }

        this.emit({
            kind: 'settings-updated',
            at: this.now(),
            deviceId: next.id,
            updateIntervalSec: next.updateIntervalSec,
            hostChanged,
            credentialsChanged,
        })

        return this.describe()
    }

    /* ---------------------------------------------------------------------- */
    /*  Diagnostics                                                           */
    /* ---------------------------------------------------------------------- */

    /**
     * Fetch the status page once and write the raw bytes to filePath. Does
     * not touch the cache or the failure tracker.
     */
    async dumpRawResponse(filePath: string): Promise<DumpResult> {
        const result = await this.transport.fetchStatus(FIELD_CATEGORIES, this.abort?.signal)
        if (!result.ok) return { ok: false, failure: result.failure }

        await fs.mkdir(path.dirname(filePath), { recursive: true })
        await fs.writeFile(filePath, result.body)
        return { ok: true, filePath, bytes: result.body.length }
    }

    /* ---------------------------------------------------------------------- */
    /*  Events                                                                */
    /* ---------------------------------------------------------------------- */

    private emit(evt: InverterEvent): void {
        this.deps.events.publish(evt)
    }
}
