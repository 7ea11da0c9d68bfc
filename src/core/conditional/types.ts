import type { FhirMockError, StoredResource } from '#protocol'
import type { ObservabilityContext } from '#observability'

export type WriteSuccess = {
    ok: true
    created: boolean
    location: string
    resource: StoredResource
    diagnostics: string
}

export type OperationFailure = {
    ok: false
    error: FhirMockError
}

export type WriteResult = WriteSuccess | OperationFailure

export type ReadResult =
    | { ok: true; resource: StoredResource }
    | OperationFailure

export type OperationContext = {
    observability?: ObservabilityContext
}
