import { createTraceId, deriveRequestId } from './trace'
import { shouldSampleTrace } from './sampling'
import { ObservabilityRuntime } from './runtime/ObservabilityRuntime'
import type { ObservabilityRuntimeCreateArgs } from './runtime/types'

export const Observability = {
    trace: {
        createId: createTraceId,
        requestId: deriveRequestId
    },
    sampling: {
        isSampled: shouldSampleTrace
    },
    runtime: {
        create: (args: ObservabilityRuntimeCreateArgs) => new ObservabilityRuntime(args)
    }
} as const
