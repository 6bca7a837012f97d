// services/collector/src/core/state.ts
import { EventEmitter } from 'node:events'
import * as jsonpatch from 'fast-json-patch' // CJS/ESM-safe import

import type { DeviceSnapshot } from '../devices/micro-inverter/types.js'

/* -------------------------------------------------------------------------- */
/*  Full AppState                                                             */
/* -------------------------------------------------------------------------- */

export type AppState = {
    version: number
    meta: { startedAt: string; status: 'booting' | 'ready' | 'error' }
    inverters: Record<string, DeviceSnapshot>
}

export type PatchEvent = {
    from: number
    to: number
    patch: jsonpatch.Operation[]
}

function clone<T>(v: T): T {
    return structuredClone(v)
}

/**
 * Versioned copy of everything published to clients. Every change bumps the
 * version and emits a JSON-Patch against the previous state ('patch') plus
 * the full state ('snapshot').
 */
export class StateStore {
    private state: AppState
    private readonly events = new EventEmitter()

    constructor(startedAt: Date = new Date()) {
        this.state = {
            version: 0,
            meta: { startedAt: startedAt.toISOString(), status: 'booting' },
            inverters: {},
        }
    }

    getSnapshot(): AppState {
        return clone(this.state)
    }

    get version(): number {
        return this.state.version
    }

    setStatus(status: AppState['meta']['status']): void {
        if (this.state.meta.status === status) return
        this.commit({ ...this.state, meta: { ...this.state.meta, status } })
    }

    setInverter(snapshot: DeviceSnapshot): void {
        this.commit({
            ...this.state,
            inverters: { ...this.state.inverters, [snapshot.deviceId]: clone(snapshot) },
        })
    }

    removeInverter(deviceId: string): void {
        if (!(deviceId in this.state.inverters)) return
        const { [deviceId]: _removed, ...rest } = this.state.inverters
        this.commit({ ...this.state, inverters: rest })
    }

    onPatch(listener: (evt: PatchEvent) => void): () => void {
        this.events.on('patch', listener)
        return () => {
            this.events.off('patch', listener)
        }
    }

    onSnapshot(listener: (state: AppState) => void): () => void {
        this.events.on('snapshot', listener)
        return () => {
            this.events.off('snapshot', listener)
        }
    }

    /* ---------------------------------------------------------------------- */
    /*  Internal event emission helpers                                       */
    /* ---------------------------------------------------------------------- */

    private commit(next: Omit<AppState, 'version'>): void {
        const prev = this.state
        const updated: AppState = { ...next, version: prev.version + 1 }
        this.state = updated

        const ops = jsonpatch.compare(prev, updated)
        if (ops.length > 0) {
            this.events.emit('patch', {
                from: prev.version,
                to: updated.version,
                patch: ops,
            } satisfies PatchEvent)
        }
        this.events.emit('snapshot', clone(updated))
    }
}
