// services/collector/src/server.ts
import type { FastifyInstance } from 'fastify'
import {
    createLogger,
    LogChannel,
} from '@sunbridge/logging'

import { buildApp } from './app.js'
import { loadEnv } from './core/env.js'
import { ConfigurationError, errorMessage } from './core/errors.js'

async function start() {
    loadEnv()

    const { channel } = createLogger('collector')
    const logCollector = channel(LogChannel.collector)

    const PORT = Number(process.env.API_PORT ?? 3000)
    const HOST = process.env.API_HOST ?? '0.0.0.0'

    let app: FastifyInstance | null = null

    try {
        app = buildApp()
        await app.listen({ port: PORT, host: HOST })

        const env = process.env.NODE_ENV ?? 'development'
        logCollector.info(`listening host=${HOST} port=${PORT} env=${env}`)

        // Graceful shutdown
        const shutdown = async (signal: NodeJS.Signals) => {
            try {
                logCollector.info(`received ${signal}, shutting down`)
                await app?.close()
                logCollector.info('collector closed')
                process.exit(0)
            } catch (err) {
                logCollector.error('error during shutdown', { err: errorMessage(err) })
                process.exit(1)
            }
        }
        process.on('SIGINT', () => void shutdown('SIGINT'))
        process.on('SIGTERM', () => void shutdown('SIGTERM'))
    } catch (err) {
        // Boot failure (e.g. invalid inverter configuration)
        if (err instanceof ConfigurationError) {
            for (const e of err.errors) logCollector.error(`config error: ${e}`)
        }
        logCollector.error(`failed to start err="${errorMessage(err)}"`)
        await app?.close().catch((closeErr: unknown) => {
            logCollector.warn('error closing after failed start', { err: errorMessage(closeErr) })
        })
        process.exit(1)
    }
}

void start()
