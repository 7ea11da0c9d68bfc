import { describe, expect, it, vi } from 'vitest'
import { BundleTransactionProcessor } from '../../src/core/bundle'
import { ConditionalOperationCoordinator } from '../../src/core/conditional'
import { IdentityAssigner } from '../../src/core/identity'
import type { IdentityOptions } from '../../src/core/identity'
import { ResourceStore } from '../../src/core/store'
import { FhirMockError } from '../../src/protocol'
import type { FhirMockLogger } from '../../src/shared'
import { catchError, deterministicIdentity, recordingObservability } from '../helpers'

const BASE = 'http://test.local/fhir'
const MRN = { system: 'urn:mrn', value: '123' }

const setup = (options: { identity?: IdentityOptions; logger?: FhirMockLogger } = {}) => {
    const store = new ResourceStore()
    const coordinator = new ConditionalOperationCoordinator({
        store,
        baseUrl: BASE,
        identity: new IdentityAssigner(options.identity ?? deterministicIdentity())
    })
    const processor = new BundleTransactionProcessor({
        coordinator,
        baseUrl: BASE,
        basePath: '/fhir',
        logger: options.logger
    })
    return { store, processor }
}

describe('BundleTransactionProcessor', () => {
    it('runs a mixed batch in order', () => {
        const { processor } = setup()

        const result = processor.process({
            resourceType: 'Bundle',
            type: 'batch',
            entry: [
                { request: { method: 'POST', url: 'Patient' }, resource: { resourceType: 'Patient', identifier: [MRN] } },
                {
                    request: { method: 'POST', url: 'Patient', ifNoneExist: 'identifier=urn:mrn|123' },
                    resource: { resourceType: 'Patient', identifier: [MRN] }
                },
                { request: { method: 'DELETE', url: 'Patient/gen-1' } },
                {
                    request: { method: 'PUT', url: 'Patient/gen-1' },
                    resource: { resourceType: 'Patient', identifier: [MRN], gender: 'male' }
                },
                { request: { method: 'GET', url: 'Patient/gen-1' } },
                { request: { method: 'GET', url: 'Patient?identifier=urn:mrn|123' } }
            ]
        })

        expect(result.resourceType).toBe('Bundle')
        expect(result.type).toBe('batch-response')
        expect(result.entry.map(e => e.response.status)).toEqual([
            '201 Created',
            '200 OK',
            '404 Not Found',
            '200 OK',
            '200 OK',
            '200 OK'
        ])
        expect(result.entry[0]?.response.location).toBe(`${BASE}/Patient/gen-1`)
        expect(result.entry[1]?.response.outcome).toMatchObject({
            created: false,
            issue: [{ severity: 'information', code: 'informational', diagnostics: 'Resource already exists, not created' }]
        })
        expect(result.entry[2]?.response.outcome).toEqual({
            resourceType: 'OperationOutcome',
            issue: [{ severity: 'error', code: 'not-supported', diagnostics: 'Method DELETE not supported' }]
        })
        expect(result.entry[4]?.resource).toMatchObject({ id: 'gen-1', gender: 'male' })
        expect(result.entry[5]?.resource).toMatchObject({
            resourceType: 'Bundle',
            type: 'searchset',
            total: 1,
            entry: [{ fullUrl: `${BASE}/Patient/gen-1` }]
        })
    })

    it('isolates malformed entries and keeps going', () => {
        const { store, processor } = setup()

        const result = processor.process({
            type: 'batch',
            entry: [
                { request: { method: 'POST', url: 'Patient' }, resource: { resourceType: 'Patient' } },
                'not-an-entry',
                { request: { method: 'POST', url: '' }, resource: { resourceType: 'Patient' } },
                { request: { method: 'POST', url: 'Patient' }, resource: { resourceType: 'Patient' } }
            ]
        })

        expect(result.entry).toHaveLength(4)
        expect(result.entry.map(e => e.response.status)).toEqual([
            '201 Created',
            '400 Bad Request',
            '400 Bad Request',
            '201 Created'
        ])
        expect(result.entry[1]?.response.outcome?.issue[0]?.diagnostics).toBe('Invalid bundle entry')
        expect(result.entry[2]?.response.outcome?.issue[0]?.diagnostics).toBe('Invalid URL format: ')
        expect(store.all('Patient').map(r => r.id)).toEqual(['gen-1', 'gen-2'])
    })

    it('resolves PUT entries by query first, then by id', () => {
        const { processor } = setup()
        const resource = { resourceType: 'Patient', identifier: [MRN] }

        const result = processor.process({
            type: 'batch',
            entry: [
                { request: { method: 'PUT', url: 'Patient?identifier=123' }, resource },
                { request: { method: 'PUT', url: 'Patient?identifier=123' }, resource },
                { request: { method: 'POST', url: 'Patient' }, resource },
                { request: { method: 'PUT', url: 'Patient?identifier=123' }, resource },
                { request: { method: 'PUT', url: 'Patient' }, resource }
            ]
        })

        expect(result.entry.map(e => e.response.status)).toEqual([
            '201 Created',
            '200 OK',
            '201 Created',
            '412 Precondition Failed',
            '400 Bad Request'
        ])
        expect(result.entry[3]?.response.outcome?.issue).toEqual([{
            severity: 'error',
            code: 'multiple-matches',
            diagnostics: 'Multiple resources match the search criteria: 2 found'
        }])
        expect(result.entry[4]?.response.outcome?.issue[0]?.diagnostics).toBe('Invalid URL format: Patient')
    })

    it('validates POST entries and fills the kind from the url', () => {
        const { processor } = setup()

        const result = processor.process({
            type: 'batch',
            entry: [
                { request: { method: 'POST', url: 'Patient' } },
                { request: { method: 'POST', url: 'Patient/abc' }, resource: {} },
                { request: { method: 'post', url: 'http://test.local/fhir/Observation' }, resource: { status: 'final' } },
                { request: { url: 'Observation' } },
                { request: { method: 'POST', url: 'Patient' }, resource: { resourceType: 'Observation' } }
            ]
        })

        expect(result.entry.map(e => e.response.status)).toEqual([
            '400 Bad Request',
            '400 Bad Request',
            '201 Created',
            '200 OK',
            '400 Bad Request'
        ])
        expect(result.entry.map(e => e.response.outcome?.issue[0]?.diagnostics)).toEqual([
            'Bundle entry POST Patient has no resource',
            'Invalid URL format: Patient/abc',
            'Resource Observation/gen-1 created successfully',
            undefined,
            'Resource type Observation does not match Patient'
        ])
        expect(result.entry[2]?.response.location).toBe(`${BASE}/Observation/gen-1`)
        expect(result.entry[3]?.resource).toMatchObject({ type: 'searchset', total: 1 })
    })

    it('turns unexpected failures into a 500 entry and logs them', () => {
        const logger = { warn: vi.fn() }
        const { processor } = setup({
            logger,
            identity: {
                createId: () => {
                    throw new Error('id source exhausted')
                }
            }
        })

        const result = processor.process({
            type: 'batch',
            entry: [
                { request: { method: 'POST', url: 'Patient' }, resource: { resourceType: 'Patient' } },
                { request: { method: 'PUT', url: 'Patient/p-1' }, resource: { resourceType: 'Patient' } }
            ]
        })

        expect(result.entry.map(e => e.response.status)).toEqual(['500 Internal Server Error', '201 Created'])
        expect(result.entry[0]?.response.outcome?.issue).toEqual([{
            severity: 'error',
            code: 'exception',
            diagnostics: 'Error processing entry: id source exhausted'
        }])
        expect(logger.warn).toHaveBeenCalledTimes(1)
        expect(logger.warn).toHaveBeenCalledWith('bundle entry failed', {
            code: 'exception',
            message: 'id source exhausted'
        })
    })

    it('rejects a document that is not a bundle', () => {
        const { processor } = setup()

        const notObject = catchError(() => processor.process('nope'))
        const badEntries = catchError(() => processor.process({ entry: {} }))

        expect(notObject).toBeInstanceOf(FhirMockError)
        expect(notObject).toMatchObject({ code: 'invalid' })
        expect(badEntries).toMatchObject({ code: 'invalid', message: expect.stringMatching(/^Invalid bundle: entry: /) })
    })

    it('defaults to a collection bundle', () => {
        const { processor } = setup()
        expect(processor.process({})).toEqual({ resourceType: 'Bundle', type: 'collection-response', entry: [] })
    })

    it('emits an event per entry and a summary', () => {
        const { processor } = setup()
        const { events, context } = recordingObservability()

        processor.process({
            type: 'transaction',
            entry: [
                { request: { method: 'POST', url: 'Patient' }, resource: { resourceType: 'Patient' } },
                { request: { method: 'DELETE', url: 'Patient/x' } }
            ]
        }, { observability: context })

        expect(events).toEqual([
            { type: 'bundle:entry', payload: { index: 0, method: 'POST', url: 'Patient', status: '201 Created' } },
            { type: 'bundle:entry', payload: { index: 1, method: 'DELETE', url: 'Patient/x', status: '404 Not Found' } },
            { type: 'bundle:done', payload: { type: 'transaction-response', entries: 2 } }
        ])
    })
})
