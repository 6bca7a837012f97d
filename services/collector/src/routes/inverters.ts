// services/collector/src/routes/inverters.ts
import type { FastifyPluginAsync, FastifyReply } from 'fastify'
import path from 'node:path'

import {
    ConfigurationError,
    DuplicateDeviceError,
    UnknownDeviceError,
    errorMessage,
} from '../core/errors.js'

export interface InverterRoutesOptions {
    /** Root for diagnostic dumps; files go to <dataDir>/dumps. */
    dataDir: string
}

type IdParams = { id: string }

/** File-name-safe timestamp, e.g. 2026-05-01T10-20-30-000Z. */
export function dumpTimestamp(date: Date): string {
    return date.toISOString().replace(/[:.]/g, '-')
}

function sendError(reply: FastifyReply, err: unknown) {
    if (err instanceof UnknownDeviceError) {
        reply.code(404)
        return { ok: false, error: err.message }
    }
    if (err instanceof DuplicateDeviceError) {
        reply.code(409)
        return { ok: false, error: err.message, errors: err.errors }
    }
    if (err instanceof ConfigurationError) {
        reply.code(400)
        return { ok: false, error: err.message, errors: err.errors }
    }
    reply.code(500)
    return { ok: false, error: errorMessage(err) }
}

const inverterRoutes: FastifyPluginAsync<InverterRoutesOptions> = async (app, opts) => {
    const registry = app.inverters
    const dumpDir = path.resolve(opts.dataDir, 'dumps')

    app.get('/api/inverters', async () => ({
        inverters: registry.snapshots(),
    }))

    app.get<{ Params: IdParams }>('/api/inverters/:id', async (req, reply) => {
        const service = registry.get(req.params.id)
        if (!service) return sendError(reply, new UnknownDeviceError(req.params.id))
        return service.getSnapshot()
    })

    app.post('/api/inverters', async (req, reply) => {
        try {
            const service = await registry.add(req.body ?? {})
            reply.code(201)
            return { ok: true, inverter: service.describe(), snapshot: service.getSnapshot() }
        } catch (err) {
            return sendError(reply, err)
        }
    })

    app.patch<{ Params: IdParams }>('/api/inverters/:id', async (req, reply) => {
        try {
            const inverter = registry.update(req.params.id, req.body ?? {})
            return { ok: true, inverter }
        } catch (err) {
            return sendError(reply, err)
        }
    })

    app.delete<{ Params: IdParams }>('/api/inverters/:id', async (req, reply) => {
        try {
            await registry.remove(req.params.id)
            return { ok: true }
        } catch (err) {
            return sendError(reply, err)
        }
    })

    // Connection test for an entry that is not registered yet.
    app.post('/api/inverters/probe', async (req, reply) => {
        try {
            return await registry.probe(req.body ?? {})
        } catch (err) {
            return sendError(reply, err)
        }
    })

    app.post<{ Params: IdParams }>('/api/inverters/:id/dump', async (req, reply) => {
        try {
            const service = registry.require(req.params.id)
            const file = path.join(dumpDir, `${service.id}-${dumpTimestamp(new Date())}.html`)
            const result = await service.dumpRawResponse(file)
            if (!result.ok) {
                reply.code(502)
                return { ok: false, failure: result.failure }
            }
            return result
        } catch (err) {
            return sendError(reply, err)
        }
    })
}

export default inverterRoutes
