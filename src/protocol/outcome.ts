import type { FhirMockError } from './error'
import type { OperationOutcome, StoredResource, WriteOutcome } from './types'

export function information(diagnostics: string): OperationOutcome {
    return {
        resourceType: 'OperationOutcome',
        issue: [{ severity: 'information', code: 'informational', diagnostics }]
    }
}

export function error(err: Pick<FhirMockError, 'code' | 'message'>): OperationOutcome {
    return {
        resourceType: 'OperationOutcome',
        issue: [{ severity: 'error', code: err.code, diagnostics: err.message }]
    }
}

export function write(args: {
    created: boolean
    location: string
    resource: StoredResource
    diagnostics: string
}): WriteOutcome {
    return {
        ...information(args.diagnostics),
        location: args.location,
        created: args.created,
        created_resource: args.resource
    }
}
