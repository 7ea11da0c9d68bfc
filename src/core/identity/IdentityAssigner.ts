import { cloneDocument, createResourceId, isPlainObject } from '#shared'
import { resourceDocumentSchema, throwError } from '#protocol'
import type { StoredResource } from '#protocol'
import { isResourceModel } from '../model'
import type { ResourceInput } from '../model'

export type IdentityOptions = {
    now?: () => Date
    createId?: () => string
}

export const INITIAL_VERSION_ID = '1'

/**
 * Stamps `id` (when missing) and `meta` onto a submitted resource. Never touches the store.
 */
export class IdentityAssigner {
    private readonly now: () => Date
    private readonly createId: () => string

    constructor(options: IdentityOptions = {}) {
        this.now = options.now ?? (() => new Date())
        this.createId = options.createId ?? createResourceId
    }

    timestamp(): string {
        return this.now().toISOString()
    }

    assign(input: ResourceInput): StoredResource {
        const model = isResourceModel(input) ? input : undefined
        const raw = model ? model.toResource() : input
        if (!isPlainObject(raw)) {
            throwError('invalid', 'Resource must be a JSON object')
        }

        const parsed = resourceDocumentSchema.safeParse(cloneDocument(raw))
        if (!parsed.success) {
            const issue = parsed.error.issues[0]
            const field = issue?.path.length ? String(issue.path[0]) : 'resource'
            throwError('invalid', `Invalid resource: ${field}: ${issue?.message ?? 'invalid input'}`)
        }
        const document = parsed.data

        const id = document.id ? document.id : this.createId()
        if (model && model.id !== id) {
            model.id = id
        }

        return {
            ...document,
            id,
            meta: {
                versionId: INITIAL_VERSION_ID,
                lastUpdated: this.timestamp()
            }
        }
    }
}
