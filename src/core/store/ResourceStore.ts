import { cloneDocument } from '#shared'
import type { StoredResource } from '#protocol'

export type ResourcePartition = Map<string, StoredResource>

/**
 * kind → id → resource. Records are copied on the way in and out, so callers never alias stored state.
 */
export class ResourceStore {
    private readonly partitions = new Map<string, ResourcePartition>()

    constructor(seed?: Record<string, StoredResource[]>) {
        if (seed) {
            Object.entries(seed).forEach(([resourceType, items]) => {
                items.forEach(item => this.put(resourceType, item.id, item))
            })
        }
    }

    /** Lazily created and memoized per kind. */
    partition(resourceType: string): ResourcePartition {
        const key = String(resourceType || '')
        const existing = this.partitions.get(key)
        if (existing) return existing
        const next: ResourcePartition = new Map()
        this.partitions.set(key, next)
        return next
    }

    /** Replaces any record already stored under the same id. */
    put(resourceType: string, id: string, resource: StoredResource): void {
        this.partition(resourceType).set(id, cloneDocument(resource))
    }

    get(resourceType: string, id: string): StoredResource | undefined {
        const current = this.partitions.get(resourceType)?.get(id)
        return current ? cloneDocument(current) : undefined
    }

    has(resourceType: string, id: string): boolean {
        return this.partitions.get(resourceType)?.has(id) ?? false
    }

    /** Insertion order, stable for a given store state. */
    all(resourceType: string): StoredResource[] {
        const partition = this.partitions.get(resourceType)
        if (!partition) return []
        return Array.from(partition.values(), cloneDocument)
    }

    kinds(): string[] {
        return Array.from(this.partitions.keys())
    }

    size(resourceType?: string): number {
        if (resourceType !== undefined) return this.partitions.get(resourceType)?.size ?? 0
        let total = 0
        this.partitions.forEach(partition => { total += partition.size })
        return total
    }

    /** Empties every partition; the store object itself is kept. */
    reset(): void {
        this.partitions.forEach(partition => partition.clear())
    }
}
