import type { ErrorCode, FhirMockErrorDetails } from './types'

const FHIR_MOCK_ERROR_BRAND = Symbol.for('fhir-mock.error')

export class FhirMockError extends Error {
    readonly code: ErrorCode
    readonly details?: FhirMockErrorDetails
    readonly [FHIR_MOCK_ERROR_BRAND] = true

    constructor(code: ErrorCode, message: string, details?: FhirMockErrorDetails) {
        super(message)
        this.name = 'FhirMockError'
        this.code = code
        this.details = details
    }
}

export function isFhirMockError(value: unknown): value is FhirMockError {
    if (value instanceof FhirMockError) return true
    if (!value || typeof value !== 'object') return false
    return Reflect.get(value, FHIR_MOCK_ERROR_BRAND) === true
}

export function createError(code: ErrorCode, message: string, details?: FhirMockErrorDetails): FhirMockError {
    return new FhirMockError(code, message, details)
}

export function throwError(code: ErrorCode, message: string, details?: FhirMockErrorDetails): never {
    throw createError(code, message, details)
}

/**
 * Anything that is not already a FhirMockError becomes an `exception` carrying the original message.
 */
export function wrap(reason: unknown, prefix?: string): FhirMockError {
    if (isFhirMockError(reason)) return reason
    const message = reason instanceof Error
        ? reason.message
        : (typeof reason === 'string' && reason ? reason : 'Unknown error')
    return createError('exception', prefix ? `${prefix}${message}` : message)
}

export function errorStatus(error: Pick<FhirMockError, 'code'>): number {
    switch (error.code) {
        case 'not-found':
        case 'not-supported':
            return 404
        case 'invalid':
            return 400
        case 'multiple-matches':
            return 412
        default:
            return 500
    }
}
