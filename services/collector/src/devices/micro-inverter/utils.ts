// services/collector/src/devices/micro-inverter/utils.ts

import { isIPv4 } from 'node:net'

import { ConfigurationError, errorMessage } from '../../core/errors.js'
import {
    DEFAULT_UPDATE_INTERVAL_SEC,
    MAX_UPDATE_INTERVAL_SEC,
    MIN_UPDATE_INTERVAL_SEC,
} from './freshness.js'
import type { InverterDeviceConfig, InverterSettingsPatch } from './types.js'

export const DEFAULT_USERNAME = 'admin'
export const DEFAULT_PASSWORD = 'admin'

const DEVICE_ID_RE = /^[A-Za-z0-9_.-]+$/

export function defaultDeviceId(host: string): string {
    return `inverter-${host.replace(/\./g, '_')}`
}

/* -------------------------------------------------------------------------- */
/*  Field checks                                                              */
/* -------------------------------------------------------------------------- */

/**
 * Accepts an integer or a plain decimal string ("30"). Anything else,
 * including "30.5", "30s" and out-of-range values, is reported.
 */
function checkInterval(raw: unknown, errors: string[]): number | null {
    let n: number
    if (typeof raw === 'number') {
        n = raw
    } else if (typeof raw === 'string' && /^\s*\d+\s*$/.test(raw)) {
        n = Number(raw)
    } else {
        errors.push(`updateIntervalSec must be an integer, got ${JSON.stringify(raw)}`)
        return null
    }

    if (!Number.isInteger(n)) {
        errors.push(`updateIntervalSec must be an integer, got ${n}`)
        return null
    }
    if (n < MIN_UPDATE_INTERVAL_SEC || n > MAX_UPDATE_INTERVAL_SEC) {
        errors.push(
            `updateIntervalSec must be within [${MIN_UPDATE_INTERVAL_SEC}, ${MAX_UPDATE_INTERVAL_SEC}], got ${n}`
        )
        return null
    }
    return n
}

function checkHost(raw: unknown, errors: string[]): string | null {
    if (typeof raw !== 'string' || !isIPv4(raw.trim())) {
        errors.push(`host must be an IPv4 address, got ${JSON.stringify(raw)}`)
        return null
    }
    return raw.trim()
}

function checkUsername(raw: unknown, errors: string[]): string | null {
    if (typeof raw !== 'string' || raw.trim() === '') {
        errors.push('username must be a non-empty string')
        return null
    }
    return raw
}

function checkPassword(raw: unknown, errors: string[]): string | null {
    if (typeof raw !== 'string') {
        errors.push('password must be a string')
        return null
    }
    return raw
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value)
}

/* -------------------------------------------------------------------------- */
/*  Whole-config validation                                                   */
/* -------------------------------------------------------------------------- */

/**
 * Validate one device entry (from env JSON or the HTTP API). Missing
 * credentials and interval take their defaults; every problem found is
 * collected into a single ConfigurationError.
 */
export function validateInverterConfig(input: unknown): InverterDeviceConfig {
    if (!isRecord(input)) {
        throw new ConfigurationError(['inverter config must be an object'])
    }

    const errors: string[] = []

    const host = checkHost(input.host, errors)
    const username = checkUsername(input.username ?? DEFAULT_USERNAME, errors)
    const password = checkPassword(input.password ?? DEFAULT_PASSWORD, errors)
    const updateIntervalSec = checkInterval(
        input.updateIntervalSec ?? DEFAULT_UPDATE_INTERVAL_SEC,
        errors
    )

    let id: string | null = null
    if (input.id === undefined) {
        id = host ? defaultDeviceId(host) : null
    } else if (typeof input.id === 'string' && DEVICE_ID_RE.test(input.id)) {
        id = input.id
    } else {
        errors.push(`id must match ${DEVICE_ID_RE.source}, got ${JSON.stringify(input.id)}`)
    }

    if (
        errors.length > 0 ||
        id === null ||
        host === null ||
        username === null ||
        password === null ||
        updateIntervalSec === null
    ) {
        throw new ConfigurationError(errors)
    }

    return { id, host, username, password, updateIntervalSec }
}

/**
 * Validate a partial settings update. Only the keys present are checked;
 * the device id cannot be changed.
 */
export function validateSettingsPatch(input: unknown): InverterSettingsPatch {
    if (!isRecord(input)) {
        throw new ConfigurationError(['settings update must be an object'])
    }

    const errors: string[] = []
    const patch: InverterSettingsPatch = {}

    if ('id' in input) errors.push('id cannot be changed')

    if (input.host !== undefined) {
        const host = checkHost(input.host, errors)
        if (host !== null) patch.host = host
    }
    if (input.username !== undefined) {
        const username = checkUsername(input.username, errors)
        if (username !== null) patch.username = username
    }
    if (input.password !== undefined) {
        const password = checkPassword(input.password, errors)
        if (password !== null) patch.password = password
    }
    if (input.updateIntervalSec !== undefined) {
        const interval = checkInterval(input.updateIntervalSec, errors)
        if (interval !== null) patch.updateIntervalSec = interval
    }

    if (errors.length > 0) throw new ConfigurationError(errors)
    return patch
}

/* -------------------------------------------------------------------------- */
/*  Config builder from environment                                           */
/* -------------------------------------------------------------------------- */

/**
 * Build the device list from process.env-style input.
 *
 * Expected env vars (see .env.example):
 *   - INVERTERS_JSON               JSON array of device entries, or
 *   - INVERTER_HOST                single device
 *   - INVERTER_USERNAME            default admin
 *   - INVERTER_PASSWORD            default admin
 *   - INVERTER_UPDATE_INTERVAL_SEC default 30
 *
 * An invalid entry fails the whole build; nothing is clamped.
 */
export function buildInverterConfigsFromEnv(env: NodeJS.ProcessEnv): InverterDeviceConfig[] {
    const rawJson = env.INVERTERS_JSON?.trim()

    if (rawJson) {
        let parsed: unknown
        try {
            parsed = JSON.parse(rawJson)
        } catch (err) {
            throw new ConfigurationError([`INVERTERS_JSON is not valid JSON: ${errorMessage(err)}`])
        }
        if (!Array.isArray(parsed)) {
            throw new ConfigurationError(['INVERTERS_JSON must be a JSON array'])
        }

        const configs: InverterDeviceConfig[] = []
        const seen = new Set<string>()
        for (const [i, entry] of parsed.entries()) {
            let cfg: InverterDeviceConfig
            try {
                cfg = validateInverterConfig(entry)
            } catch (err) {
                if (err instanceof ConfigurationError) {
                    throw new ConfigurationError(err.errors.map(e => `INVERTERS_JSON[${i}]: ${e}`))
                }
                throw err
            }
            if (seen.has(cfg.id)) {
                throw new ConfigurationError([`INVERTERS_JSON[${i}]: duplicate device id "${cfg.id}"`])
            }
            seen.add(cfg.id)
            configs.push(cfg)
        }
        return configs
    }

    const host = env.INVERTER_HOST?.trim()
    if (!host) return []

    return [
        validateInverterConfig({
            host,
            username: nonEmpty(env.INVERTER_USERNAME),
            password: env.INVERTER_PASSWORD,
            updateIntervalSec: nonEmpty(env.INVERTER_UPDATE_INTERVAL_SEC),
        }),
    ]
}

function nonEmpty(value: string | undefined): string | undefined {
    if (value === undefined || value === '') return undefined
    return value
}
