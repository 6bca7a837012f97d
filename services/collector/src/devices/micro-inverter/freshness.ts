// services/collector/src/devices/micro-inverter/freshness.ts

import { FIELD_CATEGORIES, type FieldCategory } from './types.js'

/** Diagnostic data rarely changes; refreshing it often only loads the device. */
export const WIFI_INTERVAL_SEC = 900
export const DEVICE_INFO_INTERVAL_SEC = 86_400

export const MIN_UPDATE_INTERVAL_SEC = 10
export const MAX_UPDATE_INTERVAL_SEC = 3600
export const DEFAULT_UPDATE_INTERVAL_SEC = 30

export type CategoryIntervals = Record<FieldCategory, number>

/**
 * Minimum re-fetch interval (ms) per category for a given power/energy
 * interval. The interval is assumed to be validated already.
 */
export function categoryIntervals(updateIntervalSec: number): CategoryIntervals {
    const updateMs = updateIntervalSec * 1000
    return {
        power: updateMs,
        energy: updateMs,
        wifi: WIFI_INTERVAL_SEC * 1000,
        device: DEVICE_INFO_INTERVAL_SEC * 1000,
    }
}

/** Retry cadence, and the wait after an interval change: the power/energy interval. */
export function tickIntervalMs(intervals: CategoryIntervals): number {
    return intervals.power
}

/**
 * Delay until the next category falls due, measured after a tick. A category
 * that is already due (never fetched, or its last fetch failed) is retried
 * one tick interval from now.
 */
export function nextTickDelayMs(
    lastFetchAt: Readonly<Record<FieldCategory, number | null>>,
    now: number,
    intervals: CategoryIntervals
): number {
    const retryMs = tickIntervalMs(intervals)
    const waits = FIELD_CATEGORIES.map(c => {
        const last = lastFetchAt[c]
        if (last === null) return retryMs
        const wait = last + intervals[c] - now
        return wait > 0 ? wait : retryMs
    })
    return Math.max(0, Math.min(...waits))
}

/**
 * A category that has never been fetched successfully is always due;
 * otherwise it is due once its interval has fully elapsed.
 */
export function isDue(
    category: FieldCategory,
    lastFetchAt: number | null,
    now: number,
    intervals: CategoryIntervals
): boolean {
    if (lastFetchAt === null) return true
    return now - lastFetchAt >= intervals[category]
}

/** Due categories in fixed order (power, energy, wifi, device). */
export function dueCategories(
    lastFetchAt: Readonly<Record<FieldCategory, number | null>>,
    now: number,
    intervals: CategoryIntervals
): FieldCategory[] {
    return FIELD_CATEGORIES.filter(c => isDue(c, lastFetchAt[c], now, intervals))
}
