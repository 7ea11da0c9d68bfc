import { isPlainObject, normalizeBaseUrl, parseOrThrow, z } from '#shared'
import type { FhirMockLogger } from '#shared'
import type { DebugConfig, DebugEvent } from '#observability'
import { ModelRegistry } from '../core/model'
import type { ResourceModelFactory } from '../core/model'
import type { IdentityOptions } from '../core/identity'

export const DEFAULT_BASE_URL = 'http://localhost:8080/fhir'

export type FhirMockServerHookArgs = {
    method: string
    pathname: string
    traceId?: string
    requestId: string
}

export type FhirMockServerHook<TArgs> = (args: TArgs) => void | Promise<void>

export type FhirMockServerDebugConfig = DebugConfig & {
    scope?: string
    onEvent?: (e: DebugEvent) => void
}

export type FhirMockServerObservabilityConfig = {
    logger?: FhirMockLogger
    trace?: {
        createId?: () => string
    }
    debug?: FhirMockServerDebugConfig
    hooks?: {
        onRequest?: FhirMockServerHook<FhirMockServerHookArgs & { request: Request }>
        onResponse?: FhirMockServerHook<FhirMockServerHookArgs & { status: number }>
        onError?: FhirMockServerHook<FhirMockServerHookArgs & { error: unknown }>
    }
}

export type MockFhirServerConfig = {
    /** Prefix of every `location` and the urls the server answers, e.g. `http://localhost:8080/fhir`. */
    baseUrl?: string
    identity?: IdentityOptions
    models?: ModelRegistry | Record<string, ResourceModelFactory>
    observability?: FhirMockServerObservabilityConfig
}

export type ResolvedServerConfig = {
    baseUrl: string
    /** Path part of `baseUrl` without trailing slash; empty when the server sits at the root. */
    basePath: string
    identity: IdentityOptions
    models: ModelRegistry
    observability: FhirMockServerObservabilityConfig
}

const optionalFunction = z.unknown().refine(
    value => typeof value === 'function',
    'must be a function'
).optional()

const modelsSchema = z.unknown().refine(
    value => value instanceof ModelRegistry
        || (isPlainObject(value) && Object.values(value).every(factory => typeof factory === 'function')),
    'must be a ModelRegistry or a map of model factories'
).optional()

const configSchema = z.object({
    baseUrl: z.url().optional(),
    identity: z.object({
        now: optionalFunction,
        createId: optionalFunction
    }).loose().optional(),
    models: modelsSchema,
    observability: z.object({
        logger: z.object({}).loose().optional(),
        trace: z.object({ createId: optionalFunction }).loose().optional(),
        debug: z.object({
            enabled: z.boolean().optional(),
            sampleRate: z.number().min(0).max(1).optional(),
            includePayload: z.boolean().optional(),
            redact: optionalFunction,
            scope: z.string().optional(),
            onEvent: optionalFunction
        }).loose().optional(),
        hooks: z.object({
            onRequest: optionalFunction,
            onResponse: optionalFunction,
            onError: optionalFunction
        }).loose().optional()
    }).loose().optional()
}).loose()

function basePathOf(baseUrl: string): string {
    try {
        return new URL(baseUrl).pathname.replace(/\/+$/g, '')
    } catch {
        return ''
    }
}

export function resolveServerConfig(config: MockFhirServerConfig = {}): ResolvedServerConfig {
    parseOrThrow(configSchema, config, { prefix: '[MockFhirServer] ' })

    const baseUrl = normalizeBaseUrl(config.baseUrl ?? DEFAULT_BASE_URL)
    const models = config.models instanceof ModelRegistry
        ? config.models
        : new ModelRegistry(config.models)

    return {
        baseUrl,
        basePath: basePathOf(baseUrl),
        identity: config.identity ?? {},
        models,
        observability: config.observability ?? {}
    }
}
