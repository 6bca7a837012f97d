import {
    type ClientLog,
    type ClientLogBuffer,
    type ClientLogListener
} from './types.js'

const DEFAULT_LIMIT = 500

function resolveLimit(raw: string | undefined): number {
    const n = Number(raw ?? DEFAULT_LIMIT)
    return Number.isFinite(n) && n > 0 ? Math.trunc(n) : DEFAULT_LIMIT
}

/**
 * Bounded in-memory log history with live fan-out. The WebSocket feed uses
 * it to replay recent lines on connect and to stream new ones.
 */
export function makeClientBuffer(limit: number = resolveLimit(process.env.CLIENT_LOGS_TO_KEEP)): ClientLogBuffer {
    const buf: ClientLog[] = []
    const listeners = new Set<ClientLogListener>()

    const push = (log: ClientLog): void => {
        buf.push(log)
        if (buf.length > limit) buf.shift()
        for (const l of listeners) {
            try {
                l(log)
            } catch {
                // a broken subscriber must not stop logging; it is dropped
                listeners.delete(l)
            }
        }
    }

    const getLatest = (n: number): ClientLog[] => {
        if (n <= 0) return []
        return buf.slice(-n)
    }

    const subscribe = (listener: ClientLogListener): () => void => {
        listeners.add(listener)
        return () => { listeners.delete(listener) }
    }

    return { push, getLatest, subscribe }
}
