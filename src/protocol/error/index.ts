import * as errorFns from './fns'

export const error = {
    create: errorFns.createError,
    throw: errorFns.throwError,
    wrap: errorFns.wrap,
    is: errorFns.isFhirMockError,
    status: errorFns.errorStatus
} as const

export { FhirMockError, createError, errorStatus, isFhirMockError, throwError, wrap as toFhirMockError } from './fns'
export type { ErrorCode, FhirMockErrorDetails } from './types'
