import { childLogger, createNoopLogger, errorMessage } from '#shared'
import type { FhirMockLogger } from '#shared'
import {
    Protocol,
    bundleEntrySchema,
    bundleSchema,
    createError,
    errorStatus,
    parseRequestTarget,
    statusToken,
    throwError,
    toFhirMockError,
    writeStatus
} from '#protocol'
import type { BundleEntryInput, BundleResponseEntry, FhirMockError, ResponseBundle } from '#protocol'
import type { ObservabilityContext } from '#observability'
import { bindPayload } from '../conditional'
import type { ConditionalOperationCoordinator, WriteResult } from '../conditional'

export type BundleTransactionProcessorOptions = {
    coordinator: ConditionalOperationCoordinator
    baseUrl: string
    /** Path prefix stripped from absolute entry urls, e.g. `/fhir`. */
    basePath?: string
    logger?: FhirMockLogger
}

export type BundleProcessContext = {
    observability?: ObservabilityContext
    logger?: FhirMockLogger
}

function errorEntry(error: FhirMockError): BundleResponseEntry {
    return {
        response: {
            status: statusToken(errorStatus(error)),
            outcome: Protocol.outcome.error(error)
        }
    }
}

function writeEntry(result: WriteResult): BundleResponseEntry {
    if (!result.ok) return errorEntry(result.error)
    return {
        response: {
            status: statusToken(writeStatus(result.created)),
            location: result.location,
            outcome: Protocol.outcome.write({
                created: result.created,
                location: result.location,
                resource: result.resource,
                diagnostics: result.diagnostics
            })
        }
    }
}

/**
 * Runs bundle entries one by one in submission order. Each entry succeeds or fails on its own:
 * nothing is rolled back and a failing entry never stops the ones after it.
 */
export class BundleTransactionProcessor {
    private readonly coordinator: ConditionalOperationCoordinator
    private readonly baseUrl: string
    private readonly basePath?: string
    private readonly logger: FhirMockLogger

    constructor(options: BundleTransactionProcessorOptions) {
        this.coordinator = options.coordinator
        this.baseUrl = options.baseUrl
        this.basePath = options.basePath
        this.logger = options.logger ?? createNoopLogger()
    }

    process(bundle: unknown, context: BundleProcessContext = {}): ResponseBundle {
        const parsed = bundleSchema.safeParse(bundle)
        if (!parsed.success) {
            const issue = parsed.error.issues[0]
            const path = issue?.path.length ? `${issue.path.join('.')}: ` : ''
            throwError('invalid', `Invalid bundle: ${path}${issue?.message ?? 'invalid input'}`)
        }

        const logger = context.logger ?? this.logger
        const entries = parsed.data.entry ?? []
        const responses: BundleResponseEntry[] = []

        entries.forEach((entry, index) => {
            const observability = context.observability?.with({ entryIndex: index })
            const checked = bundleEntrySchema.safeParse(entry)
            const method = checked.success ? (checked.data.request?.method ?? 'GET').toUpperCase() : 'UNKNOWN'
            const url = checked.success ? (checked.data.request?.url ?? '') : ''

            let response: BundleResponseEntry
            if (!checked.success) {
                response = errorEntry(createError('invalid', 'Invalid bundle entry', { entryIndex: index }))
            } else {
                try {
                    response = this.processEntry({ method, url, entry: checked.data }, { observability })
                } catch (err) {
                    const error = toFhirMockError(err, 'Error processing entry: ')
                    childLogger(logger, { entryIndex: index }).warn?.('bundle entry failed', {
                        code: error.code,
                        message: errorMessage(err)
                    })
                    response = errorEntry(error)
                }
            }

            observability?.emit('bundle:entry', { index, method, url, status: response.response.status })
            responses.push(response)
        })

        const result = Protocol.bundle.response(parsed.data.type, responses)
        context.observability?.emit('bundle:done', { type: result.type, entries: responses.length })
        logger.debug?.('bundle processed', { type: result.type, entries: responses.length })
        return result
    }

    private processEntry(
        args: { method: string; url: string; entry: BundleEntryInput },
        context: { observability?: ObservabilityContext }
    ): BundleResponseEntry {
        const { method, url } = args
        const resource = args.entry.resource
        const target = parseRequestTarget(url, this.basePath)
        const invalidUrl = () => errorEntry(createError('invalid', `Invalid URL format: ${url}`, { method, url }))

        if (method !== 'POST' && method !== 'PUT' && method !== 'GET') {
            return errorEntry(createError('not-supported', `Method ${method} not supported`, { method, url }))
        }

        const resourceType = target.resourceType
        if (!resourceType || target.segments.length > 2) return invalidUrl()

        if (method === 'GET') {
            if (target.id !== undefined) {
                const read = this.coordinator.read(resourceType, target.id)
                if (!read.ok) return errorEntry(read.error)
                return { response: { status: statusToken(200) }, resource: read.resource }
            }
            const matches = this.coordinator.search(resourceType, target.query)
            return {
                response: { status: statusToken(200) },
                resource: Protocol.bundle.searchset(this.baseUrl, matches)
            }
        }

        if (!resource) {
            return errorEntry(createError('invalid', `Bundle entry ${method} ${url} has no resource`, { method, url }))
        }

        if (method === 'POST') {
            if (target.id !== undefined) return invalidUrl()
            const payload = bindPayload(resource, resourceType)
            const ifNoneExist = args.entry.request?.ifNoneExist
            return writeEntry(ifNoneExist
                ? this.coordinator.conditionalCreate(payload, ifNoneExist, context)
                : this.coordinator.create(payload))
        }

        if (target.query) {
            return writeEntry(this.coordinator.conditionalUpdate(resourceType, resource, target.query, context))
        }
        if (target.id !== undefined) {
            return writeEntry(this.coordinator.update(resourceType, target.id, resource))
        }
        return invalidUrl()
    }
}
