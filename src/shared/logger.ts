export type LogMeta = Record<string, unknown>

export type FhirMockLogger = {
    child?: (bindings: LogMeta) => FhirMockLogger
    debug?: (msg: string, meta?: LogMeta) => void
    info?: (msg: string, meta?: LogMeta) => void
    warn?: (msg: string, meta?: LogMeta) => void
    error?: (msg: string, meta?: LogMeta) => void
}

export function createNoopLogger(): FhirMockLogger {
    return {}
}

export function childLogger(logger: FhirMockLogger, bindings: LogMeta): FhirMockLogger {
    return logger.child ? logger.child(bindings) : logger
}
