import type { DebugConfig, DebugEvent, ObservabilityContext } from '../types'

export type ObservabilityRuntimeCreateArgs = {
    scope: string
    debug?: DebugConfig
    onEvent?: (e: DebugEvent) => void
}

export type ObservabilityCreateContextArgs = {
    traceId?: string
}

export type ObservabilityRuntimeApi = {
    scope: string
    createContext: (args?: ObservabilityCreateContextArgs) => ObservabilityContext
    requestId: (traceId: string) => string
}
