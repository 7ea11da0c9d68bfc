import type { FhirMockDebugEventMap, ObservabilityContext } from '../src/observability'
import type { IdentityOptions } from '../src/core/identity'

export const FIXED_NOW = '2024-05-06T07:08:09.000Z'

export function deterministicIdentity(prefix = 'gen'): Required<IdentityOptions> {
    let seq = 0
    return {
        now: () => new Date(FIXED_NOW),
        createId: () => {
            seq += 1
            return `${prefix}-${seq}`
        }
    }
}

export type RecordedEvent = {
    type: keyof FhirMockDebugEventMap
    payload: unknown
}

export function recordingObservability() {
    const events: RecordedEvent[] = []
    const context: ObservabilityContext = {
        active: true,
        traceId: 't-test',
        emit: (type, payload) => {
            events.push({ type, payload })
        },
        with: () => context
    }
    return { events, context }
}

export function catchError(fn: () => unknown): unknown {
    try {
        fn()
    } catch (err) {
        return err
    }
    throw new Error('expected function to throw')
}
