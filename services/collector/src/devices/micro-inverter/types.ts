// services/collector/src/devices/micro-inverter/types.ts

/* -------------------------------------------------------------------------- */
/*  Fields + categories                                                       */
/* -------------------------------------------------------------------------- */

/**
 * Refresh tier of a field. power and energy follow the configured update
 * interval; wifi and device identity are refreshed on fixed, slow intervals.
 */
export type FieldCategory = 'power' | 'energy' | 'wifi' | 'device'

export const FIELD_CATEGORIES: readonly FieldCategory[] = ['power', 'energy', 'wifi', 'device']

/** Every value the status page exposes, fully typed. */
export interface InverterFields {
    /** Instantaneous output in W. */
    power: number
    /** Energy produced today in kWh. */
    energyToday: number
    /** Lifetime energy counter in kWh. */
    energyTotal: number

    wifiSsid: string
    /** Signal strength as reported by the device, e.g. "49%". */
    wifiSignal: string
    wifiIp: string

    serialNumber: string
    firmwareVersion: string
    moduleId: string
    macAddress: string
}

export type FieldName = keyof InverterFields

/** Result of one extraction; fields the page did not carry are absent. */
export type FieldMap = Partial<InverterFields>

export const FIELD_CATEGORY: Record<FieldName, FieldCategory> = {
    power: 'power',
    energyToday: 'energy',
    energyTotal: 'energy',
    wifiSsid: 'wifi',
    wifiSignal: 'wifi',
    wifiIp: 'wifi',
    serialNumber: 'device',
    firmwareVersion: 'device',
    moduleId: 'device',
    macAddress: 'device',
}

export const CATEGORY_FIELDS: Record<FieldCategory, readonly FieldName[]> = {
    power: ['power'],
    energy: ['energyToday', 'energyTotal'],
    wifi: ['wifiSsid', 'wifiSignal', 'wifiIp'],
    device: ['serialNumber', 'firmwareVersion', 'moduleId', 'macAddress'],
}

export const UNKNOWN = 'unknown'

/* -------------------------------------------------------------------------- */
/*  Cache + snapshot                                                          */
/* -------------------------------------------------------------------------- */

export type ValueOrigin = 'default' | 'restored' | 'fetched'

export interface CachedValue<K extends FieldName = FieldName> {
    name: K
    value: InverterFields[K]
    /** epoch ms of the fetch that produced the value; null for defaults/restored. */
    lastUpdatedAt: number | null
    /** false only during the tick that wrote the value. */
    isFromCache: boolean
    origin: ValueOrigin
}

/**
 * Where a published field value came from:
 *   - fresh:    fetched during the tick that produced the snapshot
 *   - cache:    fetched on an earlier tick
 *   - restored: seeded from persisted energy at start
 *   - default:  never observed (0 or "unknown")
 */
export type FieldSource = 'fresh' | 'cache' | 'restored' | 'default'

export interface SnapshotField<T> {
    value: T
    lastUpdatedAt: number | null
    source: FieldSource
}

export type SnapshotFields = { [K in FieldName]: SnapshotField<InverterFields[K]> }

/* -------------------------------------------------------------------------- */
/*  Failure tracking                                                          */
/* -------------------------------------------------------------------------- */

export type InverterStatus = 'healthy' | 'degraded' | 'offline'

export interface FailureState {
    deviceId: string
    consecutiveFailures: number
    isAvailable: boolean
    status: InverterStatus
}

export type TransportFailure =
    | { kind: 'timeout'; message: string }
    | { kind: 'connection_refused'; message: string }
    | { kind: 'unreachable'; message: string }
    | { kind: 'http_error'; status: number; message: string }
    | { kind: 'auth_error'; status: number; message: string }

/** Response arrived but did not look like a supported status page. */
export type ParseFailure = { kind: 'malformed'; message: string }

export type FetchFailure = TransportFailure | ParseFailure

export type FetchOutcome =
    | { ok: true }
    | { ok: false; failure: FetchFailure }

/* -------------------------------------------------------------------------- */
/*  Collaborator contracts                                                    */
/* -------------------------------------------------------------------------- */

export type FetchResult =
    | { ok: true; statusCode: number; body: Buffer }
    | { ok: false; failure: TransportFailure }

export type ExtractResult =
    | { ok: true; fields: FieldMap }
    | { ok: false; failure: ParseFailure }

/**
 * One authenticated read of the device status page. Implementations must
 * resolve (never reject) and honour the abort signal.
 */
export interface InverterTransport {
    fetchStatus(categories: readonly FieldCategory[], signal?: AbortSignal): Promise<FetchResult>
}

export interface PersistedEnergy {
    energyToday: number
    energyTotal: number
    /** epoch ms of the fetch that produced these values. */
    updatedAt: number
}

/** Durable key-value storage for the energy subset, keyed by device id. */
export interface EnergyStore {
    load(deviceId: string): Promise<PersistedEnergy | null>
    save(deviceId: string, record: PersistedEnergy): Promise<void>
}

/* -------------------------------------------------------------------------- */
/*  Configuration                                                             */
/* -------------------------------------------------------------------------- */

export interface InverterDeviceConfig {
    /** Stable identity; also the persistence key. */
    id: string
    /** IPv4 address of the inverter on the local network. */
    host: string
    username: string
    password: string
    /** power/energy refresh interval in seconds, within [10, 3600]. */
    updateIntervalSec: number
}

/** Fields of a running device that may be changed in place. */
export type InverterSettingsPatch = Partial<Omit<InverterDeviceConfig, 'id'>>

/* -------------------------------------------------------------------------- */
/*  Published snapshot                                                        */
/* -------------------------------------------------------------------------- */

export interface DeviceSnapshot {
    deviceId: string
    host: string
    /** epoch ms when the snapshot was built. */
    takenAt: number
    available: boolean
    status: InverterStatus
    consecutiveFailures: number
    lastSuccessAt: number | null
    lastFailure: (FetchFailure & { at: number }) | null
    fields: SnapshotFields
}

/* -------------------------------------------------------------------------- */
/*  Event sink + event union                                                  */
/* -------------------------------------------------------------------------- */

export interface InverterEventSink {
    publish(evt: InverterEvent): void
}

export type InverterEvent =
    | {
        kind: 'inverter-started'
        at: number
        deviceId: string
        host: string
        updateIntervalSec: number
        restored: PersistedEnergy | null
    }
    | {
        kind: 'inverter-stopped'
        at: number
        deviceId: string
    }
    | {
        kind: 'fetch-succeeded'
        at: number
        deviceId: string
        categories: FieldCategory[]
        durationMs: number
    }
    | {
        kind: 'fetch-failed'
        at: number
        deviceId: string
        categories: FieldCategory[]
        failure: FetchFailure
        consecutiveFailures: number
    }
    | {
        kind: 'availability-changed'
        at: number
        deviceId: string
        available: boolean
        status: InverterStatus
        consecutiveFailures: number
    }
    | {
        kind: 'energy-value-rejected'
        at: number
        deviceId: string
        field: 'energyToday' | 'energyTotal'
        fetched: number
        kept: number
    }
    | {
        kind: 'energy-persisted'
        at: number
        deviceId: string
        record: PersistedEnergy
    }
    | {
        kind: 'persistence-error'
        at: number
        deviceId: string
        op: 'load' | 'save'
        error: string
    }
    | {
        kind: 'settings-updated'
        at: number
        deviceId: string
        updateIntervalSec: number
        hostChanged: boolean
        credentialsChanged: boolean
    }
    | {
        kind: 'snapshot-published'
        at: number
        deviceId: string
        dueCategories: FieldCategory[]
    }
    | {
        kind: 'listener-error'
        at: number
        deviceId: string
        error: string
    }
