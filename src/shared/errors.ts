export function toError(reason: unknown): Error {
    if (reason instanceof Error) return reason
    if (typeof reason === 'string' && reason) return new Error(reason)
    try {
        return new Error(JSON.stringify(reason))
    } catch {
        return new Error('Unknown error')
    }
}

export function errorMessage(reason: unknown): string {
    return toError(reason).message
}

export function serializeErrorForLog(error: unknown) {
    if (error instanceof Error) {
        return {
            name: error.name,
            message: error.message,
            stack: error.stack,
            ...(error.cause !== undefined ? { cause: error.cause } : {})
        }
    }
    return { value: error }
}
