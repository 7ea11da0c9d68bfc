export type DebugConfig = {
    enabled?: boolean
    /** 0..1, sampled per traceId. */
    sampleRate?: number
    includePayload?: boolean
    redact?: (value: unknown) => unknown
}

export type DebugEvent = {
    schemaVersion: 1
    type: string
    traceId: string
    requestId?: string
    entryIndex?: number
    sequence: number
    timestamp: string
    scope: string
    payload?: unknown
}

export type DebugEmitMeta = {
    requestId?: string
    entryIndex?: number
}

export type FhirMockDebugEventMap = {
    'server:request': { method: string; pathname: string }
    'server:response': { status: number }
    'server:error': { message: string }
    'conditional:create:match': { resourceType: string; criteria: string; matches: number; id: string }
    'conditional:create:miss': { resourceType: string; criteria: string }
    'conditional:update:create': { resourceType: string; criteria: string }
    'conditional:update:match': { resourceType: string; criteria: string; id: string }
    'conditional:update:ambiguous': { resourceType: string; criteria: string; matches: number }
    'bundle:entry': { index: number; method: string; url: string; status: string }
    'bundle:done': { type: string; entries: number }
}

export type EmitFn<EventMap extends Record<string, unknown>> = <K extends keyof EventMap & string>(
    type: K,
    payload: EventMap[K],
    meta?: DebugEmitMeta
) => void

export type ObservabilityContext<EventMap extends Record<string, unknown> = FhirMockDebugEventMap> = {
    active: boolean
    traceId?: string
    emit: EmitFn<EventMap>
    with: (meta: DebugEmitMeta) => ObservabilityContext<EventMap>
}
