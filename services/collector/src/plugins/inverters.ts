// services/collector/src/plugins/inverters.ts

import type { FastifyInstance, FastifyPluginAsync } from 'fastify'
import fp from 'fastify-plugin'

import {
    createLogger,
    LogChannel,
    type ChannelLogger,
    type ClientLogBuffer,
} from '@sunbridge/logging'

import { InverterStateAdapter } from '../adapters/inverter.adapter.js'
import { errorMessage } from '../core/errors.js'
import { MemoryEnergyStore } from '../core/persistence/energyStore.js'
import { InverterRegistry } from '../core/registry/InverterRegistry.js'
import type { StateStore } from '../core/state.js'
import { InverterHttpClient } from '../devices/micro-inverter/InverterHttpClient.js'
import type { TransportFactory } from '../devices/micro-inverter/MicroInverterService.js'
import type {
    EnergyStore,
    FetchFailure,
    InverterEvent,
    InverterEventSink,
} from '../devices/micro-inverter/types.js'
import { buildInverterConfigsFromEnv } from '../devices/micro-inverter/utils.js'

// ---- Fastify decoration ----------------------------------------------------

declare module 'fastify' {
    interface FastifyInstance {
        inverters: InverterRegistry
    }
}

export interface InvertersPluginOptions {
    /** Device entries to register; defaults to the ones built from process.env. */
    devices?: unknown[]
    store?: EnergyStore
    createTransport?: TransportFactory
    now?: () => number
    /** Start polling when the server is ready (default true). */
    autoStart?: boolean
}

export const httpTransportFactory: TransportFactory = cfg =>
    new InverterHttpClient({ host: cfg.host, username: cfg.username, password: cfg.password })

// ---- Event sink using collector logging ------------------------------------

function describeFailure(f: FetchFailure): string {
    if (f.kind === 'http_error' || f.kind === 'auth_error') {
        return `${f.kind} status=${f.status}`
    }
    return `${f.kind} message=${JSON.stringify(f.message)}`
}

export class InverterLoggerEventSink implements InverterEventSink {
    private readonly log: ChannelLogger
    private readonly logPersist: ChannelLogger

    constructor(clientBuf?: ClientLogBuffer) {
        const { channel } = createLogger('inverter', clientBuf)
        this.log = channel(LogChannel.inverter)
        this.logPersist = channel(LogChannel.persistence)
    }

    publish(evt: InverterEvent): void {
        const ctx = { deviceId: evt.deviceId }
        switch (evt.kind) {
            case 'inverter-started': {
                const restored = evt.restored
                    ? ` restoredToday=${evt.restored.energyToday} restoredTotal=${evt.restored.energyTotal}`
                    : ''
                this.log.info(
                    `kind=${evt.kind} id=${evt.deviceId} host=${evt.host} interval=${evt.updateIntervalSec}s${restored}`,
                    ctx
                )
                break
            }

            case 'inverter-stopped': {
                this.log.info(`kind=${evt.kind} id=${evt.deviceId}`, ctx)
                break
            }

            case 'fetch-succeeded': {
                this.log.debug(
                    `kind=${evt.kind} id=${evt.deviceId} categories=${evt.categories.join(',')} ms=${evt.durationMs}`,
                    ctx
                )
                break
            }

            case 'fetch-failed': {
                // Night-time outages are routine; only a page we cannot read or
                // rejected credentials need attention.
                const line = `kind=${evt.kind} id=${evt.deviceId} failures=${evt.consecutiveFailures} ${describeFailure(evt.failure)}`
                if (evt.failure.kind === 'malformed' || evt.failure.kind === 'auth_error') {
                    this.log.warn(line, ctx)
                } else {
                    this.log.debug(line, ctx)
                }
                break
            }

            case 'availability-changed': {
                const line = `kind=${evt.kind} id=${evt.deviceId} status=${evt.status} available=${evt.available}`
                if (evt.available) this.log.info(line, ctx)
                else this.log.warn(line, ctx)
                break
            }

            case 'energy-value-rejected': {
                this.log.debug(
                    `kind=${evt.kind} id=${evt.deviceId} field=${evt.field} fetched=${evt.fetched} kept=${evt.kept}`,
                    ctx
                )
                break
            }

            case 'energy-persisted': {
                this.logPersist.debug(
                    `kind=${evt.kind} id=${evt.deviceId} today=${evt.record.energyToday} total=${evt.record.energyTotal}`,
                    ctx
                )
                break
            }

            case 'persistence-error': {
                this.logPersist.error(`kind=${evt.kind} id=${evt.deviceId} op=${evt.op} error=${evt.error}`, ctx)
                break
            }

            case 'settings-updated': {
                this.log.info(
                    `kind=${evt.kind} id=${evt.deviceId} interval=${evt.updateIntervalSec}s hostChanged=${evt.hostChanged} credentialsChanged=${evt.credentialsChanged}`,
                    ctx
                )
                break
            }

            case 'snapshot-published': {
                // Once per tick per device -> no log.
                break
            }

            case 'listener-error': {
                this.log.warn(`kind=${evt.kind} id=${evt.deviceId} error=${evt.error}`, ctx)
                break
            }
        }
    }
}

// ---- Fanout sink -----------------------------------------------------------

export class FanoutInverterEventSink implements InverterEventSink {
    private readonly sinks: InverterEventSink[]
    private readonly onError: (err: unknown) => void

    constructor(onError: (err: unknown) => void, ...sinks: InverterEventSink[]) {
        this.onError = onError
        this.sinks = sinks
    }

    publish(evt: InverterEvent): void {
        for (const sink of this.sinks) {
            try {
                sink.publish(evt)
            } catch (err) {
                this.onError(err)
            }
        }
    }
}

// ---- Plugin implementation -------------------------------------------------

const invertersPlugin: FastifyPluginAsync<InvertersPluginOptions> = async (
    app: FastifyInstance,
    opts: InvertersPluginOptions
) => {
    const { channel } = createLogger('inverters-plugin', app.clientBuf)
    const logPlugin = channel(LogChannel.collector)

    // 1) Event sinks
    const events = new FanoutInverterEventSink(
        err => logPlugin.warn('inverter event sink failed', { err: errorMessage(err) }),
        new InverterLoggerEventSink(app.clientBuf)
    )

    // 2) Registry + state mirror
    const registry = new InverterRegistry({
        events,
        store: opts.store ?? new MemoryEnergyStore(),
        createTransport: opts.createTransport ?? httpTransportFactory,
        now: opts.now,
    })
    const adapter = bindStateAdapter(registry, app.appState)

    app.decorate('inverters', registry)

    // 3) Devices; an invalid entry fails the boot
    const devices = opts.devices ?? buildInverterConfigsFromEnv(process.env)
    for (const device of devices) {
        await registry.add(device)
    }
    logPlugin.info(`registered inverters count=${registry.list().length}`)

    // 4) Lifecycle hooks
    app.addHook('onReady', async () => {
        if (opts.autoStart === false) return
        logPlugin.info('starting inverter polling')
        await registry.startAll()
    })

    app.addHook('onClose', async () => {
        logPlugin.info('stopping inverter polling')
        adapter()
        await registry.stopAll().catch((err: unknown) => {
            logPlugin.warn('error stopping inverter polling', { err: errorMessage(err) })
        })
    })
}

function bindStateAdapter(registry: InverterRegistry, state: StateStore): () => void {
    const adapter = new InverterStateAdapter(state)
    return registry.onChange(change => adapter.handle(change))
}

export default fp(invertersPlugin, {
    name: 'inverters-plugin',
})
