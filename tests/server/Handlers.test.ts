import { describe, expect, it, vi } from 'vitest'
import { MockFhirServer, createFhirHandlers } from '../../src/server'
import type { DebugEvent } from '../../src/observability'
import { deterministicIdentity } from '../helpers'

const BASE = 'http://localhost:8080/fhir'

const post = (url: string, body: string, headers: Record<string, string> = {}) => new Request(url, {
    method: 'POST',
    headers: { 'Content-Type': 'application/fhir+json', ...headers },
    body
})

describe('createFhirHandlers', () => {
    it('answers a fetch Request with a FHIR JSON Response', async () => {
        const { fetch, server } = createFhirHandlers({ identity: deterministicIdentity() })

        const response = await fetch(post(`${BASE}/Patient`, JSON.stringify({ resourceType: 'Patient' })))

        expect(response.status).toBe(201)
        expect(response.headers.get('content-type')).toBe('application/fhir+json')
        expect(response.headers.get('location')).toBe(`${BASE}/Patient/gen-1`)
        expect(await response.json()).toMatchObject({ created: true, created_resource: { id: 'gen-1' } })
        expect(server.read('Patient', 'gen-1')).toMatchObject({ resourceType: 'Patient' })
    })

    it('wraps an existing server', async () => {
        const server = new MockFhirServer({ identity: deterministicIdentity() })
        server.createResource({ resourceType: 'Patient', id: 'p-1' })

        const handlers = createFhirHandlers(server)
        const response = await handlers.fetch(new Request(`${BASE}/Patient/p-1`))

        expect(handlers.server).toBe(server)
        expect(response.status).toBe(200)
        expect(await response.json()).toMatchObject({ id: 'p-1' })
    })

    it('runs hooks around a request and carries the incoming trace id', async () => {
        const onRequest = vi.fn()
        const onResponse = vi.fn()
        const { fetch } = createFhirHandlers({
            identity: deterministicIdentity(),
            observability: { hooks: { onRequest, onResponse } }
        })

        await fetch(post(`${BASE}/Patient`, JSON.stringify({ resourceType: 'Patient' }), { 'x-trace-id': 't-1' }))

        expect(onRequest).toHaveBeenCalledWith(expect.objectContaining({
            method: 'POST',
            pathname: '/fhir/Patient',
            traceId: 't-1',
            requestId: 'r_t-1_1'
        }))
        expect(onResponse).toHaveBeenCalledWith({
            method: 'POST',
            pathname: '/fhir/Patient',
            traceId: 't-1',
            requestId: 'r_t-1_1',
            status: 201
        })
    })

    it('rejects a body that is not JSON', async () => {
        const logger = { warn: vi.fn(), error: vi.fn() }
        const onError = vi.fn()
        const onResponse = vi.fn()
        const { fetch } = createFhirHandlers({ observability: { logger, hooks: { onError, onResponse } } })

        const response = await fetch(post(`${BASE}/Patient`, '{not json'))
        const body = await response.json()

        expect(response.status).toBe(400)
        expect(body.resourceType).toBe('OperationOutcome')
        expect(body.issue[0].code).toBe('invalid')
        expect(body.issue[0].diagnostics).toMatch(/^Invalid JSON body: /)
        expect(logger.warn).toHaveBeenCalledWith('request rejected', expect.objectContaining({ method: 'POST' }))
        expect(logger.error).not.toHaveBeenCalled()
        expect(onError).toHaveBeenCalledTimes(1)
        expect(onResponse).toHaveBeenCalledWith(expect.objectContaining({ status: 400 }))
    })

    it('calls onResponse once and still answers when it throws', async () => {
        const logger = { warn: vi.fn(), error: vi.fn() }
        const onError = vi.fn()
        const onResponse = vi.fn(() => {
            throw new Error('hook boom')
        })
        const { fetch } = createFhirHandlers({
            identity: deterministicIdentity(),
            observability: { logger, hooks: { onError, onResponse } }
        })

        const response = await fetch(post(`${BASE}/Patient`, JSON.stringify({ resourceType: 'Patient' })))
        const body = await response.json()

        expect(response.status).toBe(500)
        expect(body.issue[0].code).toBe('exception')
        expect(body.issue[0].diagnostics).toBe('hook boom')
        expect(onResponse).toHaveBeenCalledTimes(1)
        expect(onError).toHaveBeenCalledWith(expect.objectContaining({ error: expect.objectContaining({ message: 'hook boom' }) }))
        expect(logger.error).toHaveBeenCalledTimes(1)
        expect(logger.error).toHaveBeenCalledWith('request failed', expect.objectContaining({ method: 'POST' }))
    })

    it('logs a failing onError hook and keeps the error response', async () => {
        const logger = { warn: vi.fn(), error: vi.fn() }
        const onResponse = vi.fn()
        const { fetch } = createFhirHandlers({
            observability: {
                logger,
                hooks: {
                    onResponse,
                    onError: () => {
                        throw new Error('onError boom')
                    }
                }
            }
        })

        const response = await fetch(post(`${BASE}/Patient`, '{not json'))

        expect(response.status).toBe(400)
        expect(onResponse).toHaveBeenCalledTimes(1)
        expect(onResponse).toHaveBeenCalledWith(expect.objectContaining({ status: 400 }))
        expect(logger.error).toHaveBeenCalledWith('hook failed', expect.objectContaining({ hook: 'onError' }))
    })

    it('emits request and response debug events when enabled', async () => {
        const events: DebugEvent[] = []
        const { fetch } = createFhirHandlers({
            identity: deterministicIdentity(),
            observability: {
                debug: { enabled: true, includePayload: true, onEvent: e => events.push(e) }
            }
        })

        await fetch(post(`${BASE}/Patient`, JSON.stringify({ resourceType: 'Patient' }), { 'x-trace-id': 't-9' }))

        expect(events.map(e => [e.type, e.payload])).toEqual([
            ['server:request', { method: 'POST', pathname: '/fhir/Patient' }],
            ['server:response', { status: 201 }]
        ])
        expect(events.every(e => e.traceId === 't-9' && e.requestId === 'r_t-9_1')).toBe(true)
    })
})
