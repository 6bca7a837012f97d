// services/collector/src/devices/micro-inverter/InverterHttpClient.ts

import { request, type Dispatcher } from 'undici'

import type {
    FetchResult,
    FieldCategory,
    InverterTransport,
    TransportFailure,
} from './types.js'

export const STATUS_PATH = '/status.html'
export const FETCH_TIMEOUT_MS = 10_000

export interface InverterHttpClientOptions {
    host: string
    username: string
    password: string
    timeoutMs?: number
    /** Alternate undici dispatcher (connection pool, MockAgent in tests). */
    dispatcher?: Dispatcher
}

export function basicAuthHeader(username: string, password: string): string {
    return `Basic ${Buffer.from(`${username}:${password}`, 'utf8').toString('base64')}`
}

function stringProp(obj: unknown, key: 'code' | 'name' | 'message'): string | undefined {
    if (typeof obj !== 'object' || obj === null || !(key in obj)) return undefined
    const value: unknown = Reflect.get(obj, key)
    return typeof value === 'string' ? value : undefined
}

/**
 * Map whatever undici (or the socket below it) threw onto a failure kind.
 * Node wraps some socket errors, so the cause is checked too.
 */
export function classifyTransportError(err: unknown): TransportFailure {
    const cause: unknown =
        typeof err === 'object' && err !== null && 'cause' in err ? Reflect.get(err, 'cause') : undefined

    const code = stringProp(err, 'code') ?? stringProp(cause, 'code') ?? ''
    const name = stringProp(err, 'name') ?? ''
    const message = stringProp(err, 'message') ?? String(err)

    if (
        name === 'AbortError' ||
        name === 'TimeoutError' ||
        code === 'UND_ERR_ABORTED' ||
        code === 'UND_ERR_HEADERS_TIMEOUT' ||
        code === 'UND_ERR_BODY_TIMEOUT' ||
        code === 'UND_ERR_CONNECT_TIMEOUT' ||
        code === 'ETIMEDOUT'
    ) {
        return { kind: 'timeout', message }
    }

    if (code === 'ECONNREFUSED') {
        return { kind: 'connection_refused', message }
    }

    return { kind: 'unreachable', message }
}

/**
 * One authenticated GET of the inverter status page per call. The device
 * serves every field category from the same page, so the category list only
 * matters to callers that log it.
 */
export class InverterHttpClient implements InverterTransport {
    readonly url: string
    private readonly authorization: string
    private readonly timeoutMs: number
    private readonly dispatcher: Dispatcher | undefined

    constructor(opts: InverterHttpClientOptions) {
        this.url = `http://${opts.host}${STATUS_PATH}`
        this.authorization = basicAuthHeader(opts.username, opts.password)
        this.timeoutMs = opts.timeoutMs ?? FETCH_TIMEOUT_MS
        this.dispatcher = opts.dispatcher
    }

    async fetchStatus(_categories: readonly FieldCategory[], signal?: AbortSignal): Promise<FetchResult> {
        const timeout = AbortSignal.timeout(this.timeoutMs)
        const combined = signal ? AbortSignal.any([signal, timeout]) : timeout

        try {
            const { statusCode, body } = await request(this.url, {
                method: 'GET',
                headers: {
                    authorization: this.authorization,
                    accept: 'text/html',
                },
                headersTimeout: this.timeoutMs,
                bodyTimeout: this.timeoutMs,
                signal: combined,
                dispatcher: this.dispatcher,
            })

            if (statusCode < 200 || statusCode >= 300) {
                await body.dump()
                if (statusCode === 401 || statusCode === 403) {
                    return {
                        ok: false,
                        failure: { kind: 'auth_error', status: statusCode, message: `HTTP ${statusCode}` },
                    }
                }
                return {
                    ok: false,
                    failure: { kind: 'http_error', status: statusCode, message: `HTTP ${statusCode}` },
                }
            }

            const bytes = Buffer.from(await body.arrayBuffer())
            return { ok: true, statusCode, body: bytes }
        } catch (err) {
            return { ok: false, failure: classifyTransportError(err) }
        }
    }
}
