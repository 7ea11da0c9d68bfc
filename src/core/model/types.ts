import type { StoredResource } from '#protocol'

/**
 * A typed domain object that can flatten itself to a plain resource document.
 */
export interface ResourceModel {
    readonly resourceType: string
    id?: string
    toResource(): Record<string, unknown>
}

export type ResourceModelFactory<M extends ResourceModel = ResourceModel> = (resource: StoredResource) => M

/** What create/update accept: a plain JSON document or a typed model. */
export type ResourceInput = ResourceModel | Record<string, unknown>
