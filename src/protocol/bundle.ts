import { joinUrl } from '#shared'
import type { BundleResponseEntry, ResponseBundle, SearchsetBundle, StoredResource } from './types'

export function searchset(baseUrl: string, resources: StoredResource[]): SearchsetBundle {
    return {
        resourceType: 'Bundle',
        type: 'searchset',
        total: resources.length,
        entry: resources.map(resource => ({
            fullUrl: joinUrl(baseUrl, resource.resourceType, resource.id),
            resource
        }))
    }
}

export function responseType(requestType: string | undefined): string {
    return `${requestType || 'collection'}-response`
}

export function response(requestType: string | undefined, entry: BundleResponseEntry[]): ResponseBundle {
    return {
        resourceType: 'Bundle',
        type: responseType(requestType),
        entry
    }
}
