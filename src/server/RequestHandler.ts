import { createNoopLogger, isPlainObject, serializeErrorForLog } from '#shared'
import type { FhirMockLogger } from '#shared'
import {
    FHIR_JSON_CONTENT_TYPE,
    Protocol,
    createError,
    errorStatus,
    parseRequestTarget,
    throwError,
    toFhirMockError
} from '#protocol'
import type { FhirMockError } from '#protocol'
import type { ObservabilityContext } from '#observability'
import { bindPayload } from '../core/conditional'
import type { ConditionalOperationCoordinator, WriteResult } from '../core/conditional'
import type { BundleTransactionProcessor } from '../core/bundle'
import { getHeader } from './http'
import type { HandleRequest, HandleResult } from './http'

export type RequestHandlerOptions = {
    coordinator: ConditionalOperationCoordinator
    processor: BundleTransactionProcessor
    baseUrl: string
    basePath?: string
    logger?: FhirMockLogger
}

export type RequestHandlerContext = {
    observability?: ObservabilityContext
    logger?: FhirMockLogger
}

const HEADERS = { 'Content-Type': FHIR_JSON_CONTENT_TYPE } as const

function result(status: number, body: unknown, headers: Record<string, string> = {}): HandleResult {
    return { status, headers: { ...HEADERS, ...headers }, body }
}

function errorResult(error: FhirMockError): HandleResult {
    return result(errorStatus(error), Protocol.outcome.error(error))
}

function requireObjectBody(body: unknown): Record<string, unknown> {
    if (!isPlainObject(body)) throwError('invalid', 'Request body must be a JSON object')
    return body
}

/**
 * Routes `(method, url, headers, body)` onto the coordinator and the bundle processor.
 * Every call returns a result; failures become OperationOutcome documents.
 */
export class RequestHandler {
    private readonly coordinator: ConditionalOperationCoordinator
    private readonly processor: BundleTransactionProcessor
    private readonly baseUrl: string
    private readonly basePath?: string
    private readonly logger: FhirMockLogger

    constructor(options: RequestHandlerOptions) {
        this.coordinator = options.coordinator
        this.processor = options.processor
        this.baseUrl = options.baseUrl
        this.basePath = options.basePath
        this.logger = options.logger ?? createNoopLogger()
    }

    handle(request: HandleRequest, context: RequestHandlerContext = {}): HandleResult {
        const method = request.method.toUpperCase()
        const logger = context.logger ?? this.logger
        try {
            return this.dispatch(method, request, context)
        } catch (err) {
            const error = toFhirMockError(err)
            if (error.code === 'exception') {
                logger.error?.('request failed', { method, url: request.url, error: serializeErrorForLog(err) })
            } else {
                logger.debug?.('request rejected', { method, url: request.url, code: error.code, message: error.message })
            }
            return errorResult(error)
        }
    }

    private dispatch(method: string, request: HandleRequest, context: RequestHandlerContext): HandleResult {
        const target = parseRequestTarget(request.url, this.basePath)
        const { resourceType, id, query } = target

        if (target.segments.length <= 2) {
            if (method === 'POST') {
                if (!resourceType) return this.bundle(request.body, context)
                if (id === undefined) return this.create(resourceType, request, context)
            }

            if (method === 'PUT' && resourceType) {
                if (query) {
                    return this.write(this.coordinator.conditionalUpdate(
                        resourceType,
                        requireObjectBody(request.body),
                        query,
                        context
                    ))
                }
                if (id !== undefined) {
                    return this.write(this.coordinator.update(resourceType, id, requireObjectBody(request.body)))
                }
                throwError('invalid', `Invalid URL format: ${request.url}`, { method, url: request.url })
            }

            if (method === 'GET' && resourceType) {
                if (id !== undefined) {
                    const read = this.coordinator.read(resourceType, id)
                    return read.ok ? result(200, read.resource) : errorResult(read.error)
                }
                return result(200, Protocol.bundle.searchset(this.baseUrl, this.coordinator.search(resourceType, query)))
            }
        }

        return errorResult(createError('not-found', 'Endpoint not found', { method, url: request.url }))
    }

    private create(resourceType: string, request: HandleRequest, context: RequestHandlerContext): HandleResult {
        const payload = bindPayload(requireObjectBody(request.body), resourceType)
        const ifNoneExist = getHeader(request.headers, 'If-None-Exist')
        return this.write(ifNoneExist
            ? this.coordinator.conditionalCreate(payload, ifNoneExist, context)
            : this.coordinator.create(payload))
    }

    private bundle(body: unknown, context: RequestHandlerContext): HandleResult {
        return result(200, this.processor.process(body, {
            observability: context.observability,
            logger: context.logger
        }))
    }

    private write(outcome: WriteResult): HandleResult {
        if (!outcome.ok) return errorResult(outcome.error)
        return result(
            Protocol.status.write(outcome.created),
            Protocol.outcome.write({
                created: outcome.created,
                location: outcome.location,
                resource: outcome.resource,
                diagnostics: outcome.diagnostics
            }),
            { Location: outcome.location }
        )
    }
}
