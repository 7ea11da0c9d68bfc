export { ObservabilityRuntime } from './ObservabilityRuntime'
export type { ObservabilityCreateContextArgs, ObservabilityRuntimeApi, ObservabilityRuntimeCreateArgs } from './types'
