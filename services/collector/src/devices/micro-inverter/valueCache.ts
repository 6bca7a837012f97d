// services/collector/src/devices/micro-inverter/valueCache.ts

import {
    CATEGORY_FIELDS,
    UNKNOWN,
    type CachedValue,
    type FieldCategory,
    type FieldMap,
    type FieldName,
    type FieldSource,
    type InverterFields,
    type PersistedEnergy,
    type SnapshotField,
    type SnapshotFields,
} from './types.js'

type CacheTable = { [K in FieldName]: CachedValue<K> }

export interface RejectedEnergyValue {
    field: 'energyToday' | 'energyTotal'
    fetched: number
    kept: number
}

export interface CacheUpdateResult {
    written: FieldName[]
    rejected: RejectedEnergyValue[]
}

function seed<K extends FieldName>(name: K, value: InverterFields[K]): CachedValue<K> {
    return { name, value, lastUpdatedAt: null, isFromCache: true, origin: 'default' }
}

function restore<K extends 'energyToday' | 'energyTotal'>(
    name: K,
    value: number,
    updatedAt: number
): CachedValue<K> {
    return { name, value, lastUpdatedAt: updatedAt, isFromCache: true, origin: 'restored' }
}

function sourceOf(entry: CachedValue): FieldSource {
    if (!entry.isFromCache) return 'fresh'
    if (entry.origin === 'fetched') return 'cache'
    return entry.origin
}

function view<K extends FieldName>(entry: CachedValue<K>): SnapshotField<InverterFields[K]> {
    return { value: entry.value, lastUpdatedAt: entry.lastUpdatedAt, source: sourceOf(entry) }
}

/**
 * Last-known-good value of every field for one device.
 *
 * Values are only ever overwritten, never removed. Energy counters are
 * guarded against device glitches: a lifetime total that drops or reads 0
 * and a daily total that reads 0 are rejected and the cached value stays.
 */
export class ValueCache {
    private readonly values: CacheTable

    constructor(restored: PersistedEnergy | null = null) {
        this.values = {
            power: seed('power', 0),
            energyToday: restored
                ? restore('energyToday', restored.energyToday, restored.updatedAt)
                : seed('energyToday', 0),
            energyTotal: restored
                ? restore('energyTotal', restored.energyTotal, restored.updatedAt)
                : seed('energyTotal', 0),
            wifiSsid: seed('wifiSsid', UNKNOWN),
            wifiSignal: seed('wifiSignal', UNKNOWN),
            wifiIp: seed('wifiIp', UNKNOWN),
            serialNumber: seed('serialNumber', UNKNOWN),
            firmwareVersion: seed('firmwareVersion', UNKNOWN),
            moduleId: seed('moduleId', UNKNOWN),
            macAddress: seed('macAddress', UNKNOWN),
        }
    }

    get<K extends FieldName>(name: K): CachedValue<K> {
        return { ...this.values[name] }
    }

    /**
     * Write the fields of one category from a successful extraction. Fields the
     * page did not carry keep their cached value.
     */
    update(category: FieldCategory, fields: FieldMap, now: number): CacheUpdateResult {
        const result: CacheUpdateResult = { written: [], rejected: [] }

        if (category === 'energy') {
            this.updateEnergy(fields, now, result)
            return result
        }

        for (const name of CATEGORY_FIELDS[category]) {
            const value = fields[name]
            if (value === undefined) continue
            this.write(name, value, now)
            result.written.push(name)
        }
        return result
    }

    /** End of tick: nothing is "fresh" any more. */
    settle(): void {
        for (const entry of Object.values(this.values)) {
            entry.isFromCache = true
        }
    }

    /** Current energy counters as they should be persisted. */
    energyRecord(now: number): PersistedEnergy {
        return {
            energyToday: this.values.energyToday.value,
            energyTotal: this.values.energyTotal.value,
            updatedAt: now,
        }
    }

    snapshotFields(): SnapshotFields {
        const v = this.values
        return {
            power: view(v.power),
            energyToday: view(v.energyToday),
            energyTotal: view(v.energyTotal),
            wifiSsid: view(v.wifiSsid),
            wifiSignal: view(v.wifiSignal),
            wifiIp: view(v.wifiIp),
            serialNumber: view(v.serialNumber),
            firmwareVersion: view(v.firmwareVersion),
            moduleId: view(v.moduleId),
            macAddress: view(v.macAddress),
        }
    }

    /* ---------------------------------------------------------------------- */
    /*  Internals                                                             */
    /* ---------------------------------------------------------------------- */

    private updateEnergy(fields: FieldMap, now: number, result: CacheUpdateResult): void {
        const today = fields.energyToday
        if (today !== undefined) {
            const kept = this.values.energyToday.value
            if (today > 0) {
                this.write('energyToday', today, now)
                result.written.push('energyToday')
            } else if (today !== kept) {
                result.rejected.push({ field: 'energyToday', fetched: today, kept })
            }
        }

        const total = fields.energyTotal
        if (total !== undefined) {
            const kept = this.values.energyTotal.value
            if (total > 0 && total >= kept) {
                this.write('energyTotal', total, now)
                result.written.push('energyTotal')
            } else if (total !== kept) {
                result.rejected.push({ field: 'energyTotal', fetched: total, kept })
            }
        }
    }

    private write<K extends FieldName>(name: K, value: InverterFields[K], now: number): void {
        const entry: CachedValue<K> = {
            name,
            value,
            lastUpdatedAt: now,
            isFromCache: false,
            origin: 'fetched',
        }
        const table: { [P in K]: CachedValue<P> } = this.values
        table[name] = entry
    }
}
