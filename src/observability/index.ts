export { Observability } from './Observability'
export type {
    DebugConfig,
    DebugEmitMeta,
    DebugEvent,
    EmitFn,
    FhirMockDebugEventMap,
    ObservabilityContext
} from './types'
export { ObservabilityRuntime } from './runtime'
export type { ObservabilityCreateContextArgs, ObservabilityRuntimeApi, ObservabilityRuntimeCreateArgs } from './runtime'
