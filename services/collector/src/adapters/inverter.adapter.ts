// services/collector/src/adapters/inverter.adapter.ts

import type { StateStore } from '../core/state.js'
import type { RegistryChange } from '../core/registry/InverterRegistry.js'

/**
 * InverterStateAdapter
 *
 * Mirrors registry changes into AppState.inverters. Holds no state of its
 * own; every published snapshot replaces the device's entry wholesale.
 */
export class InverterStateAdapter {
    private readonly state: StateStore

    constructor(state: StateStore) {
        this.state = state
    }

    handle(change: RegistryChange): void {
        switch (change.kind) {
            case 'data': {
                this.state.setInverter(change.snapshot)
                return
            }

            case 'removed': {
                this.state.removeInverter(change.deviceId)
                return
            }
        }
    }
}
