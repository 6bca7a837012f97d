// services/collector/src/devices/micro-inverter/statusPage.ts

import type { ExtractResult, FieldMap, InverterFields } from './types.js'

type NumericField = 'power' | 'energyToday' | 'energyTotal'
type TextField = Exclude<keyof InverterFields, NumericField>

/** Page variable carrying each field. */
const NUMERIC_VARS: Record<NumericField, string> = {
    power: 'webdata_now_p',
    energyToday: 'webdata_today_e',
    energyTotal: 'webdata_total_e',
}

const TEXT_VARS: Record<TextField, string> = {
    wifiSsid: 'cover_sta_ssid',
    wifiSignal: 'cover_sta_rssi',
    wifiIp: 'cover_sta_ip',
    serialNumber: 'webdata_sn',
    firmwareVersion: 'cover_ver',
    moduleId: 'cover_mid',
    macAddress: 'cover_sta_mac',
}

/** Marker the device writes while a value is not available. */
const PLACEHOLDER = '---'

function readVar(page: string, name: string): string | null {
    const re = new RegExp(`var\\s+${name}\\s*=\\s*"([^"]*)";`)
    const m = re.exec(page)
    return m ? m[1].trim() : null
}

function usable(raw: string | null): raw is string {
    return raw !== null && raw !== '' && raw !== PLACEHOLDER
}

export function parseNumeric(raw: string | null): number | undefined {
    if (!usable(raw)) return undefined
    const n = Number(raw)
    return Number.isFinite(n) ? n : undefined
}

/**
 * Pull the status fields out of the device's status page. The page embeds
 * every value as `var <name> = "<value>";` in an inline script. A page without
 * the current-power variable is not a status page.
 */
export function extractStatusFields(raw: Buffer | string): ExtractResult {
    const page = typeof raw === 'string' ? raw : raw.toString('utf8')

    if (readVar(page, NUMERIC_VARS.power) === null) {
        return {
            ok: false,
            failure: { kind: 'malformed', message: `missing ${NUMERIC_VARS.power}` },
        }
    }

    const fields: FieldMap = {}

    const power = parseNumeric(readVar(page, NUMERIC_VARS.power))
    if (power !== undefined) fields.power = power
    const energyToday = parseNumeric(readVar(page, NUMERIC_VARS.energyToday))
    if (energyToday !== undefined) fields.energyToday = energyToday
    const energyTotal = parseNumeric(readVar(page, NUMERIC_VARS.energyTotal))
    if (energyTotal !== undefined) fields.energyTotal = energyTotal

    for (const key of Object.keys(TEXT_VARS)) {
        if (!isTextField(key)) continue
        const value = readVar(page, TEXT_VARS[key])
        if (usable(value)) fields[key] = value
    }

    return { ok: true, fields }
}

function isTextField(key: string): key is TextField {
    return Object.prototype.hasOwnProperty.call(TEXT_VARS, key)
}
