// services/collector/src/core/errors.ts

/** Input rejected before it reached a device service. */
export class ValidationError extends Error {
    readonly errors: string[]

    constructor(message: string, errors: string[] = [message]) {
        super(message)
        this.name = 'ValidationError'
        this.errors = errors
    }
}

/**
 * Device configuration that cannot be used: bad host, credentials or
 * interval, or an id that is already registered. Values are never clamped.
 */
export class ConfigurationError extends ValidationError {
    constructor(errors: string[]) {
        super(`invalid inverter configuration: ${errors.join('; ')}`, errors)
        this.name = 'ConfigurationError'
    }
}

export class DuplicateDeviceError extends ConfigurationError {
    readonly deviceId: string

    constructor(deviceId: string) {
        super([`device id "${deviceId}" is already registered`])
        this.name = 'DuplicateDeviceError'
        this.deviceId = deviceId
    }
}

export class UnknownDeviceError extends Error {
    readonly deviceId: string

    constructor(deviceId: string) {
        super(`unknown inverter "${deviceId}"`)
        this.name = 'UnknownDeviceError'
        this.deviceId = deviceId
    }
}

export function errorMessage(err: unknown): string {
    if (err instanceof Error) return err.message
    return String(err)
}
