import lodash from 'lodash'

export function isPlainObject(value: unknown): value is Record<string, unknown> {
    return lodash.isPlainObject(value)
}

/**
 * Structured JSON copy. Stored documents never share references with callers.
 */
export function cloneDocument<T>(value: T): T {
    return lodash.cloneDeep(value)
}
