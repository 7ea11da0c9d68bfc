export { MockFhirServer } from './MockFhirServer'
export { createFhirHandlers } from './createFhirHandlers'
export type { FhirHandlers } from './createFhirHandlers'
export { RequestHandler } from './RequestHandler'
export type { RequestHandlerContext, RequestHandlerOptions } from './RequestHandler'
export { DEFAULT_BASE_URL, resolveServerConfig } from './config'
export type {
    FhirMockServerDebugConfig,
    FhirMockServerHook,
    FhirMockServerHookArgs,
    FhirMockServerObservabilityConfig,
    MockFhirServerConfig,
    ResolvedServerConfig
} from './config'
export { formatTopLevelError } from './error'
export { getHeader, handleResultToResponse, readJsonBody } from './http'
export type { HandleRequest, HandleResult, HeaderSource } from './http'
export { createRuntimeFactory } from './runtime'
export type { CreateServerRuntime, ServerRuntime } from './runtime'
