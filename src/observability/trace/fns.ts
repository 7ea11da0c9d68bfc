import { createPrefixedId } from '#shared'

export function createTraceId(): string {
    return createPrefixedId('t')
}

export function deriveRequestId(traceId: string, seq: number): string {
    const safeSeq = Number.isFinite(seq) && seq > 0 ? Math.floor(seq) : 1
    return `r_${traceId}_${safeSeq}`
}
