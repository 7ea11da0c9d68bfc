export { IdentityAssigner, INITIAL_VERSION_ID } from './identity'
export type { IdentityOptions } from './identity'

export { SearchMatcher, SUPPORTED_SEARCH_PARAMETERS, parseIdentifierToken } from './search'
export type { SearchCriteria } from './search'

export { ResourceStore } from './store'
export type { ResourcePartition } from './store'

export { ConditionalOperationCoordinator, bindPayload, resourceTypeOf } from './conditional'
export type {
    ConditionalOperationCoordinatorOptions,
    OperationContext,
    OperationFailure,
    ReadResult,
    WriteResult,
    WriteSuccess
} from './conditional'

export { BundleTransactionProcessor } from './bundle'
export type { BundleProcessContext, BundleTransactionProcessorOptions } from './bundle'

export { ModelRegistry, SchemaResourceModel, defineResourceModel, isResourceModel } from './model'
export type { ResourceInput, ResourceModel, ResourceModelDefinition, ResourceModelFactory } from './model'
