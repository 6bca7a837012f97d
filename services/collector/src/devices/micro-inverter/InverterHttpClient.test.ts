import { afterEach, beforeEach, describe, expect, it } from 'vitest'
import { MockAgent } from 'undici'

import { statusPage } from '../../testing/fakes.js'
import {
    InverterHttpClient,
    basicAuthHeader,
    classifyTransportError,
} from './InverterHttpClient.js'

const HOST = '192.168.1.50'
const ORIGIN = `http://${HOST}`

function withCode(message: string, code: string): Error {
    return Object.assign(new Error(message), { code })
}

describe('InverterHttpClient', () => {
    let agent: MockAgent

    beforeEach(() => {
        agent = new MockAgent()
        agent.disableNetConnect()
    })

    afterEach(async () => {
        await agent.close()
    })

    function client(username = 'admin', password = 'admin') {
        return new InverterHttpClient({ host: HOST, username, password, dispatcher: agent })
    }

    it('fetches the status page with basic auth', async () => {
        agent
            .get(ORIGIN)
            .intercept({
                path: '/status.html',
                method: 'GET',
                headers: { authorization: 'Basic YWRtaW46YWRtaW4=' },
            })
            .reply(200, statusPage())

        const result = await client().fetchStatus(['power'])
        expect(result.ok).toBe(true)
        if (!result.ok) return
        expect(result.statusCode).toBe(200)
        expect(result.body.toString('utf8')).toBe(statusPage())
        agent.assertNoPendingInterceptors()
    })

    it('reports rejected credentials as an auth error', async () => {
        agent.get(ORIGIN).intercept({ path: '/status.html', method: 'GET' }).reply(401, 'Unauthorized')

        expect(await client('admin', 'wrong').fetchStatus(['power'])).toEqual({
            ok: false,
            failure: { kind: 'auth_error', status: 401, message: 'HTTP 401' },
        })
    })

    it('reports other non-2xx responses as http errors', async () => {
        agent.get(ORIGIN).intercept({ path: '/status.html', method: 'GET' }).reply(500, 'oops')

        expect(await client().fetchStatus(['power'])).toEqual({
            ok: false,
            failure: { kind: 'http_error', status: 500, message: 'HTTP 500' },
        })
    })

    it('maps a refused connection', async () => {
        agent
            .get(ORIGIN)
            .intercept({ path: '/status.html', method: 'GET' })
            .replyWithError(withCode('connect ECONNREFUSED 192.168.1.50:80', 'ECONNREFUSED'))

        const result = await client().fetchStatus(['power'])
        expect(result).toEqual({
            ok: false,
            failure: { kind: 'connection_refused', message: 'connect ECONNREFUSED 192.168.1.50:80' },
        })
    })
})

describe('classifyTransportError', () => {
    it('recognises timeouts by name or undici code', () => {
        const timeoutByName = Object.assign(new Error('signal timed out'), { name: 'TimeoutError' })
        expect(classifyTransportError(timeoutByName).kind).toBe('timeout')
        expect(classifyTransportError(withCode('headers', 'UND_ERR_HEADERS_TIMEOUT')).kind).toBe('timeout')
        expect(classifyTransportError(withCode('body', 'UND_ERR_BODY_TIMEOUT')).kind).toBe('timeout')
        expect(classifyTransportError(withCode('connect', 'UND_ERR_CONNECT_TIMEOUT')).kind).toBe('timeout')
    })

    it('looks through a wrapping cause', () => {
        const wrapped = new Error('fetch failed', { cause: withCode('refused', 'ECONNREFUSED') })
        expect(classifyTransportError(wrapped)).toEqual({
            kind: 'connection_refused',
            message: 'fetch failed',
        })
    })

    it('falls back to unreachable', () => {
        expect(classifyTransportError(withCode('no route', 'EHOSTUNREACH'))).toEqual({
            kind: 'unreachable',
            message: 'no route',
        })
        expect(classifyTransportError('boom')).toEqual({ kind: 'unreachable', message: 'boom' })
    })
})

describe('basicAuthHeader', () => {
    it('encodes user and password', () => {
        expect(basicAuthHeader('admin', 'admin')).toBe('Basic YWRtaW46YWRtaW4=')
    })
})
