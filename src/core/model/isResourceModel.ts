import type { ResourceModel } from './types'

export function isResourceModel(value: unknown): value is ResourceModel {
    if (!value || typeof value !== 'object') return false
    return typeof Reflect.get(value, 'toResource') === 'function'
        && typeof Reflect.get(value, 'resourceType') === 'string'
}
