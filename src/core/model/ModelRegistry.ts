import { throwError } from '#protocol'
import type { StoredResource } from '#protocol'
import type { ResourceModel, ResourceModelFactory } from './types'

export class ModelRegistry {
    private readonly factories = new Map<string, ResourceModelFactory>()

    constructor(entries?: Record<string, ResourceModelFactory>) {
        if (entries) {
            Object.entries(entries).forEach(([resourceType, factory]) => {
                this.register(resourceType, factory)
            })
        }
    }

    register(resourceType: string, factory: ResourceModelFactory): this {
        this.factories.set(resourceType, factory)
        return this
    }

    has(resourceType: string): boolean {
        return this.factories.has(resourceType)
    }

    get(resourceType: string): ResourceModelFactory | undefined {
        return this.factories.get(resourceType)
    }

    toModel(resource: StoredResource): ResourceModel {
        const factory = this.factories.get(resource.resourceType)
        if (!factory) {
            throwError('not-supported', `No model registered for ${resource.resourceType}`, {
                resourceType: resource.resourceType
            })
        }
        return factory(resource)
    }
}
