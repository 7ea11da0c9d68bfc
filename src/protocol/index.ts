export { Protocol } from './Protocol'

export {
    FhirMockError,
    createError,
    errorStatus,
    isFhirMockError,
    throwError,
    toFhirMockError
} from './error'
export type { ErrorCode, FhirMockErrorDetails } from './error'

export { bundleEntrySchema, bundleSchema, resourceDocumentSchema } from './schema'
export type { BundleEntryInput, BundleInput } from './schema'

export { parseRequestTarget } from './url'
export type { RequestTarget } from './url'

export { statusToken, writeStatus } from './status'

export { FHIR_JSON_CONTENT_TYPE } from './types'
export type {
    BundleEntryResponse,
    BundleRequest,
    BundleResponseEntry,
    Identifier,
    IssueCode,
    IssueSeverity,
    Meta,
    OperationOutcome,
    OperationOutcomeIssue,
    ResourceDocument,
    ResponseBundle,
    SearchsetBundle,
    SearchsetEntry,
    StoredResource,
    WriteOutcome
} from './types'
