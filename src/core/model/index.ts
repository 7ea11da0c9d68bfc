export { ModelRegistry } from './ModelRegistry'
export { SchemaResourceModel, defineResourceModel } from './defineResourceModel'
export type { ResourceModelDefinition } from './defineResourceModel'
export { isResourceModel } from './isResourceModel'
export type { ResourceInput, ResourceModel, ResourceModelFactory } from './types'
