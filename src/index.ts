/**
 * In-memory FHIR repository for tests: create/update/read/search, conditional writes and batch bundles,
 * reachable programmatically, through `handle`, or through an intercepted `fetch`.
 */

export { MockFhirServer, createFhirHandlers, RequestHandler, DEFAULT_BASE_URL } from './server'
export type {
    FhirHandlers,
    FhirMockServerHookArgs,
    HandleRequest,
    HandleResult,
    MockFhirServerConfig,
    ResolvedServerConfig
} from './server'

export { createFetchInterceptor } from './testing'
export type { FetchInterceptor } from './testing'

export {
    BundleTransactionProcessor,
    ConditionalOperationCoordinator,
    IdentityAssigner,
    ModelRegistry,
    ResourceStore,
    SchemaResourceModel,
    SearchMatcher,
    defineResourceModel,
    isResourceModel
} from './core'
export type {
    ReadResult,
    ResourceInput,
    ResourceModel,
    ResourceModelDefinition,
    ResourceModelFactory,
    SearchCriteria,
    WriteResult
} from './core'

export { FhirMockError, Protocol, createError, errorStatus, isFhirMockError, throwError, toFhirMockError } from './protocol'
export type {
    ErrorCode,
    Identifier,
    OperationOutcome,
    ResourceDocument,
    ResponseBundle,
    SearchsetBundle,
    StoredResource,
    WriteOutcome
} from './protocol'

export type { FhirMockLogger } from './shared'
export type { DebugEvent } from './observability'
