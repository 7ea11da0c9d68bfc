import { childLogger, createNoopLogger, createPrefixedId } from '#shared'
import type { FhirMockLogger } from '#shared'
import { Observability } from '#observability'
import type { ObservabilityContext } from '#observability'
import type { FhirMockServerObservabilityConfig, ResolvedServerConfig } from '../config'

export type ServerRuntime = {
    traceId?: string
    requestId: string
    logger: FhirMockLogger
    hooks?: FhirMockServerObservabilityConfig['hooks']
    observabilityContext: ObservabilityContext
}

export type CreateServerRuntime = (args?: { initialTraceId?: string }) => ServerRuntime

export function createRuntimeFactory(config: ResolvedServerConfig): CreateServerRuntime {
    const loggerBase = config.observability.logger ?? createNoopLogger()
    const debug = config.observability.debug
    const createIdFn = config.observability.trace?.createId
    const hooks = config.observability.hooks
    const observability = Observability.runtime.create({
        scope: debug?.scope ?? 'fhir-mock',
        debug,
        onEvent: debug?.onEvent
    })

    return function createRuntime(args = {}) {
        const initialTraceId = (() => {
            if (typeof args.initialTraceId === 'string' && args.initialTraceId) return args.initialTraceId
            if (typeof createIdFn === 'function') return createIdFn()
            return undefined
        })()

        const baseCtx = observability.createContext({ traceId: initialTraceId })
        const traceId = baseCtx.traceId
        const requestId = traceId ? observability.requestId(traceId) : createPrefixedId('r')

        const logger = childLogger(loggerBase, {
            ...(traceId ? { traceId } : {}),
            requestId
        })

        return {
            traceId,
            requestId,
            logger,
            hooks,
            observabilityContext: baseCtx.with({ requestId })
        }
    }
}
