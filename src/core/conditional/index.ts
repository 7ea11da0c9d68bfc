export { ConditionalOperationCoordinator, bindPayload, resourceTypeOf } from './ConditionalOperationCoordinator'
export type { ConditionalOperationCoordinatorOptions } from './ConditionalOperationCoordinator'
export type { OperationContext, OperationFailure, ReadResult, WriteResult, WriteSuccess } from './types'
