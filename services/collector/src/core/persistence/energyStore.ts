// services/collector/src/core/persistence/energyStore.ts
import { promises as fs } from 'node:fs'
import path from 'node:path'

import type { EnergyStore, PersistedEnergy } from '../../devices/micro-inverter/types.js'
import { errorMessage } from '../errors.js'

type StoreShape = Record<string, PersistedEnergy>

export const ENERGY_FILE = 'energy.json'

function isRecord(x: unknown): x is Record<string, unknown> {
    return x !== null && typeof x === 'object' && !Array.isArray(x)
}

function isPersistedEnergy(x: unknown): x is PersistedEnergy {
    return (
        isRecord(x) &&
        typeof x.energyToday === 'number' &&
        Number.isFinite(x.energyToday) &&
        typeof x.energyTotal === 'number' &&
        Number.isFinite(x.energyTotal) &&
        typeof x.updatedAt === 'number'
    )
}

function isMissingFile(err: unknown): boolean {
    return isRecord(err) && err.code === 'ENOENT'
}

/** energy.json exists but cannot be used; the next write replaces it. */
export class CorruptEnergyFileError extends Error {
    constructor(message: string) {
        super(message)
        this.name = 'CorruptEnergyFileError'
    }
}

/** Entries that do not look like energy records are skipped. */
function parseStore(text: string): StoreShape {
    let parsed: unknown
    try {
        parsed = JSON.parse(text)
    } catch (err) {
        throw new CorruptEnergyFileError(`energy store is not valid JSON: ${errorMessage(err)}`)
    }
    if (!isRecord(parsed)) throw new CorruptEnergyFileError('energy store is not a JSON object')

    const out: StoreShape = {}
    for (const [id, value] of Object.entries(parsed)) {
        if (isPersistedEnergy(value)) {
            out[id] = {
                energyToday: value.energyToday,
                energyTotal: value.energyTotal,
                updatedAt: value.updatedAt,
            }
        }
    }
    return out
}

/**
 * Energy counters of every device in one JSON file, keyed by device id.
 * Writes go through a temp file and a rename, one at a time.
 */
export class JsonFileEnergyStore implements EnergyStore {
    readonly file: string
    private writeChain: Promise<void> = Promise.resolve()

    constructor(dataDir: string) {
        this.file = path.resolve(dataDir, ENERGY_FILE)
    }

    async load(deviceId: string): Promise<PersistedEnergy | null> {
        const store = await this.read()
        return store[deviceId] ?? null
    }

    save(deviceId: string, record: PersistedEnergy): Promise<void> {
        const run = this.writeChain.then(() => this.write(deviceId, record))
        // Keep the chain alive after a failed write; the caller still sees the error.
        this.writeChain = run.catch(() => undefined)
        return run
    }

    private async read(): Promise<StoreShape> {
        let text: string
        try {
            text = await fs.readFile(this.file, 'utf8')
        } catch (err) {
            if (isMissingFile(err)) return {}
            throw err
        }
        return parseStore(text)
    }

    private async write(deviceId: string, record: PersistedEnergy): Promise<void> {
        let store: StoreShape
        try {
            store = await this.read()
        } catch (err) {
            if (err instanceof CorruptEnergyFileError) store = {}
            else throw err
        }

        store[deviceId] = { ...record }

        await fs.mkdir(path.dirname(this.file), { recursive: true })
        const tmp = this.file + '.tmp'
        await fs.writeFile(tmp, JSON.stringify(store, null, 2) + '\n', 'utf8')
        await fs.rename(tmp, this.file)
    }
}

/** Process-local store for tests and for running without a data directory. */
export class MemoryEnergyStore implements EnergyStore {
    private readonly records = new Map<string, PersistedEnergy>()

    async load(deviceId: string): Promise<PersistedEnergy | null> {
        const r = this.records.get(deviceId)
        return r ? { ...r } : null
    }

    async save(deviceId: string, record: PersistedEnergy): Promise<void> {
        this.records.set(deviceId, { ...record })
    }
}
