// services/collector/src/devices/micro-inverter/failureTracker.ts

import type { FailureState, FetchOutcome, InverterStatus } from './types.js'

/** Consecutive failed ticks before the device is reported offline. */
export const FAILURE_THRESHOLD = 3

export function statusForFailures(consecutiveFailures: number): InverterStatus {
    if (consecutiveFailures >= FAILURE_THRESHOLD) return 'offline'
    if (consecutiveFailures > 0) return 'degraded'
    return 'healthy'
}

/**
 * State before any fetch outcome is known. The device has not been seen yet,
 * so it is reported offline; the first failure moves it to degraded like any
 * other short outage, the first success to healthy.
 */
export function createFailureState(deviceId: string): FailureState {
    return {
        deviceId,
        consecutiveFailures: 0,
        isAvailable: false,
        status: 'offline',
    }
}

/**
 * Pure transition. A success clears everything from any state; a failure
 * bumps the counter and the status is recomputed from the counter alone.
 */
export function applyFetchOutcome(state: FailureState, outcome: FetchOutcome): FailureState {
    const consecutiveFailures = outcome.ok ? 0 : state.consecutiveFailures + 1
    const status = statusForFailures(consecutiveFailures)
    return {
        deviceId: state.deviceId,
        consecutiveFailures,
        isAvailable: status !== 'offline',
        status,
    }
}
