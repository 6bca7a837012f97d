import { describe, expect, it } from 'vitest'

import {
    DEVICE_INFO_INTERVAL_SEC,
    WIFI_INTERVAL_SEC,
    categoryIntervals,
    dueCategories,
    isDue,
    nextTickDelayMs,
    tickIntervalMs,
} from './freshness.js'

describe('categoryIntervals', () => {
    it('uses the update interval for power and energy and fixed tiers otherwise', () => {
        expect(categoryIntervals(30)).toEqual({
            power: 30_000,
            energy: 30_000,
            wifi: 900_000,
            device: 86_400_000,
        })
    })

    it('retries at the power interval', () => {
        expect(tickIntervalMs(categoryIntervals(45))).toBe(45_000)
        expect(tickIntervalMs(categoryIntervals(3600))).toBe(3_600_000)
    })
})

describe('nextTickDelayMs', () => {
    const t0 = 1_000_000

    it('waits for the category that falls due first', () => {
        const intervals = categoryIntervals(1000)
        const last = { power: t0, energy: t0, wifi: t0, device: t0 }

        expect(nextTickDelayMs(last, t0, intervals)).toBe(WIFI_INTERVAL_SEC * 1000)
        expect(nextTickDelayMs({ ...last, wifi: t0 + 900_000 }, t0 + 900_000, intervals)).toBe(100_000)
    })

    it('retries a category that has never been fetched one interval later', () => {
        const last = { power: null, energy: null, wifi: null, device: null }
        expect(nextTickDelayMs(last, t0, categoryIntervals(30))).toBe(30_000)
    })

    it('retries an overdue category one interval later', () => {
        const intervals = categoryIntervals(30)
        const last = { power: t0, energy: t0, wifi: t0, device: t0 }
        expect(nextTickDelayMs(last, t0 + 90_000, intervals)).toBe(30_000)
    })

    it('accounts for time spent in the tick', () => {
        const intervals = categoryIntervals(30)
        const last = { power: t0, energy: t0, wifi: t0, device: t0 }
        expect(nextTickDelayMs(last, t0 + 2_000, intervals)).toBe(28_000)
    })
})

describe('isDue', () => {
    const intervals = categoryIntervals(30)
    const t0 = 1_000_000

    it('is always due when never fetched', () => {
        expect(isDue('device', null, t0, intervals)).toBe(true)
    })

    it('is due exactly when the interval has elapsed', () => {
        expect(isDue('power', t0, t0 + 29_999, intervals)).toBe(false)
        expect(isDue('power', t0, t0 + 30_000, intervals)).toBe(true)
        expect(isDue('wifi', t0, t0 + 30_000, intervals)).toBe(false)
        expect(isDue('wifi', t0, t0 + WIFI_INTERVAL_SEC * 1000, intervals)).toBe(true)
        expect(isDue('device', t0, t0 + DEVICE_INFO_INTERVAL_SEC * 1000 - 1, intervals)).toBe(false)
    })
})

describe('dueCategories', () => {
    const intervals = categoryIntervals(30)

    it('lists every category on the first tick', () => {
        const never = { power: null, energy: null, wifi: null, device: null }
        expect(dueCategories(never, 0, intervals)).toEqual(['power', 'energy', 'wifi', 'device'])
    })

    it('lists only the fast tier one interval later', () => {
        const t0 = 5_000
        const last = { power: t0, energy: t0, wifi: t0, device: t0 }
        expect(dueCategories(last, t0 + 30_000, intervals)).toEqual(['power', 'energy'])
        expect(dueCategories(last, t0 + 900_000, intervals)).toEqual(['power', 'energy', 'wifi'])
    })
})
