import { isPlainObject, joinUrl } from '#shared'
import { createError, isFhirMockError, throwError } from '#protocol'
import type { StoredResource } from '#protocol'
import { IdentityAssigner } from '../identity'
import { isResourceModel } from '../model'
import type { ResourceInput } from '../model'
import { SearchMatcher } from '../search'
import type { SearchCriteria } from '../search'
import type { ResourceStore } from '../store'
import type { OperationContext, OperationFailure, ReadResult, WriteResult, WriteSuccess } from './types'

export type ConditionalOperationCoordinatorOptions = {
    store: ResourceStore
    baseUrl: string
    identity?: IdentityAssigner
    matcher?: SearchMatcher
}

function attempt<T extends { ok: true }>(fn: () => T): T | OperationFailure {
    try {
        return fn()
    } catch (err) {
        if (isFhirMockError(err)) return { ok: false, error: err }
        throw err
    }
}

export function resourceTypeOf(input: ResourceInput): string | undefined {
    const value: unknown = input.resourceType
    return typeof value === 'string' && value ? value : undefined
}

/**
 * Pins a payload to `resourceType` (filling it in when absent) and optionally to `id`.
 * Typed models are updated in place; plain documents are copied.
 */
export function bindPayload(input: ResourceInput, resourceType: string, id?: string): ResourceInput {
    const current = resourceTypeOf(input)
    if (current !== undefined && current !== resourceType) {
        throwError('invalid', `Resource type ${current} does not match ${resourceType}`, { resourceType, id })
    }

    if (isResourceModel(input)) {
        if (id !== undefined) input.id = id
        return input
    }

    if (!isPlainObject(input)) {
        throwError('invalid', 'Resource must be a JSON object', { resourceType })
    }
    return {
        ...input,
        resourceType,
        ...(id !== undefined ? { id } : {})
    }
}

export class ConditionalOperationCoordinator {
    readonly store: ResourceStore
    readonly identity: IdentityAssigner
    readonly matcher: SearchMatcher
    private readonly baseUrl: string

    constructor(options: ConditionalOperationCoordinatorOptions) {
        this.store = options.store
        this.baseUrl = options.baseUrl
        this.identity = options.identity ?? new IdentityAssigner()
        this.matcher = options.matcher ?? new SearchMatcher()
    }

    location(resourceType: string, id: string): string {
        return joinUrl(this.baseUrl, resourceType, id)
    }

    create(payload: ResourceInput): WriteResult {
        return attempt(() => this.createUnchecked(payload))
    }

    update(resourceType: string, id: string, payload: ResourceInput): WriteResult {
        return attempt(() => this.updateUnchecked(resourceType, id, payload))
    }

    /**
     * Returns the first existing match untouched, or creates the resource when nothing matches.
     */
    conditionalCreate(payload: ResourceInput, criteria: string, context: OperationContext = {}): WriteResult {
        return attempt(() => {
            const resourceType = resourceTypeOf(payload)
            if (!resourceType) {
                throwError('invalid', 'Conditional create requires a resourceType', { criteria })
            }

            const matches = this.search(resourceType, criteria)
            const existing = matches[0]
            if (existing) {
                context.observability?.emit('conditional:create:match', {
                    resourceType,
                    criteria,
                    matches: matches.length,
                    id: existing.id
                })
                return this.success({
                    created: false,
                    resource: existing,
                    diagnostics: 'Resource already exists, not created'
                })
            }

            context.observability?.emit('conditional:create:miss', { resourceType, criteria })
            return this.createUnchecked(payload)
        })
    }

    /**
     * 0 matches creates, 1 match is updated in place, 2+ matches fail with `multiple-matches` and write nothing.
     */
    conditionalUpdate(resourceType: string, payload: ResourceInput, criteria: string, context: OperationContext = {}): WriteResult {
        return attempt(() => {
            const matches = this.search(resourceType, criteria)

            if (matches.length === 0) {
                context.observability?.emit('conditional:update:create', { resourceType, criteria })
                return { ...this.createUnchecked(bindPayload(payload, resourceType)), created: true }
            }

            const [match] = matches
            if (matches.length === 1 && match) {
                context.observability?.emit('conditional:update:match', { resourceType, criteria, id: match.id })
                return { ...this.updateUnchecked(resourceType, match.id, payload), created: false }
            }

            context.observability?.emit('conditional:update:ambiguous', {
                resourceType,
                criteria,
                matches: matches.length
            })
            throw createError(
                'multiple-matches',
                `Multiple resources match the search criteria: ${matches.length} found`,
                { resourceType, criteria, matches: matches.length }
            )
        })
    }

    read(resourceType: string, id: string): ReadResult {
        const resource = this.store.get(resourceType, id)
        if (!resource) {
            return {
                ok: false,
                error: createError('not-found', `Resource ${resourceType}/${id} not found`, { resourceType, id })
            }
        }
        return { ok: true, resource }
    }

    search(resourceType: string, criteria: string | SearchCriteria): StoredResource[] {
        const parsed = typeof criteria === 'string' ? this.matcher.parse(criteria) : criteria
        return this.matcher.search(this.store.all(resourceType), parsed)
    }

    private createUnchecked(payload: ResourceInput): WriteSuccess {
        const resource = this.identity.assign(payload)
        this.store.put(resource.resourceType, resource.id, resource)
        return this.success({
            created: true,
            resource,
            diagnostics: `Resource ${resource.resourceType}/${resource.id} created successfully`
        })
    }

    private updateUnchecked(resourceType: string, id: string, payload: ResourceInput): WriteSuccess {
        const resource = this.identity.assign(bindPayload(payload, resourceType, id))
        const existed = this.store.has(resourceType, id)
        this.store.put(resourceType, id, resource)
        return this.success({
            created: !existed,
            resource,
            diagnostics: `Resource ${resourceType}/${id} ${existed ? 'updated' : 'created'} successfully`
        })
    }

    private success(args: { created: boolean; resource: StoredResource; diagnostics: string }): WriteSuccess {
        return {
            ok: true,
            created: args.created,
            location: this.location(args.resource.resourceType, args.resource.id),
            resource: args.resource,
            diagnostics: args.diagnostics
        }
    }
}
