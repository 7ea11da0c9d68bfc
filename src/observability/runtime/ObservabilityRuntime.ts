import type { DebugConfig, DebugEmitMeta, DebugEvent, EmitFn, FhirMockDebugEventMap, ObservabilityContext } from '../types'
import { shouldSampleTrace } from '../sampling'
import { createTraceId, deriveRequestId } from '../trace'
import type { ObservabilityCreateContextArgs, ObservabilityRuntimeApi, ObservabilityRuntimeCreateArgs } from './types'

type TraceCounters = {
    events: number
    requests: number
}

const silentContext = (traceId?: string): ObservabilityContext => {
    const ctx: ObservabilityContext = {
        active: false,
        traceId,
        emit: () => {},
        with: () => ctx
    }
    return ctx
}

const NOOP_CONTEXT = silentContext()

/** Shape-only view of a payload, used unless `includePayload` is set. */
function summarize(value: unknown): unknown {
    if (value === null || value === undefined) return value
    if (typeof value === 'number' || typeof value === 'boolean') return value
    if (typeof value === 'string') return { type: 'string', length: value.length }
    if (Array.isArray(value)) return { type: 'array', length: value.length }
    if (typeof value === 'object') {
        const keys = Object.keys(value)
        return { type: 'object', keyCount: keys.length, keys: keys.slice(0, 20) }
    }
    return { type: typeof value }
}

export class ObservabilityRuntime implements ObservabilityRuntimeApi {
    readonly scope: string

    private readonly debug: DebugConfig | undefined
    private readonly onEvent: ((e: DebugEvent) => void) | undefined
    private readonly counters = new Map<string, TraceCounters>()

    constructor(args: ObservabilityRuntimeCreateArgs) {
        this.scope = args.scope
        this.debug = args.debug
        this.onEvent = args.onEvent
    }

    private get enabled(): boolean {
        return Boolean(this.debug?.enabled && this.onEvent)
    }

    requestId(traceId: string): string {
        const counters = this.countersFor(traceId)
        counters.requests += 1
        return deriveRequestId(traceId, counters.requests)
    }

    createContext(args?: ObservabilityCreateContextArgs): ObservabilityContext {
        const sampleRate = this.debug?.sampleRate ?? 1
        const traceId = args?.traceId || (this.enabled && sampleRate > 0 ? createTraceId() : undefined)
        if (!traceId) return NOOP_CONTEXT

        if (!this.enabled || !shouldSampleTrace(traceId, sampleRate)) return silentContext(traceId)
        return this.activeContext(traceId, {})
    }

    private countersFor(traceId: string): TraceCounters {
        let counters = this.counters.get(traceId)
        if (!counters) {
            counters = { events: 0, requests: 0 }
            this.counters.set(traceId, counters)
        }
        return counters
    }

    private activeContext(traceId: string, bound: DebugEmitMeta): ObservabilityContext {
        const emit: EmitFn<FhirMockDebugEventMap> = (type, data, meta) => {
            this.dispatch(traceId, type, data, { ...bound, ...meta })
        }
        return {
            active: true,
            traceId,
            emit,
            with: meta => this.activeContext(traceId, { ...bound, ...meta })
        }
    }

    private dispatch(traceId: string, type: string, data: unknown, meta: DebugEmitMeta): void {
        const sink = this.onEvent
        if (!sink) return

        const counters = this.countersFor(traceId)
        counters.events += 1

        const redacted = this.debug?.redact ? this.debug.redact(data) : data
        const event: DebugEvent = {
            schemaVersion: 1,
            type,
            traceId,
            ...(meta.requestId !== undefined ? { requestId: meta.requestId } : {}),
            ...(meta.entryIndex !== undefined ? { entryIndex: meta.entryIndex } : {}),
            sequence: counters.events,
            timestamp: new Date().toISOString(),
            scope: this.scope,
            payload: this.debug?.includePayload ? redacted : summarize(redacted)
        }

        try {
            sink(event)
        } catch (err) {
            // sink failures never reach the operation that emitted the event
            void err
        }
    }
}
