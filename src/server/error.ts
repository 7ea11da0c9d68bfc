import { FHIR_JSON_CONTENT_TYPE, Protocol, errorStatus, toFhirMockError } from '#protocol'
import type { HandleResult } from './http'

/**
 * Last-resort conversion of anything thrown at the request boundary into an OperationOutcome result.
 */
export function formatTopLevelError(error: unknown): HandleResult {
    const standard = toFhirMockError(error)
    return {
        status: errorStatus(standard),
        headers: { 'Content-Type': FHIR_JSON_CONTENT_TYPE },
        body: Protocol.outcome.error(standard)
    }
}
