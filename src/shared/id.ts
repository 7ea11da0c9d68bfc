import { randomUUID } from 'node:crypto'

/**
 * Resource ids are plain v4 UUID strings, as most FHIR servers hand them out.
 */
export function createResourceId(): string {
    return randomUUID()
}

export function createPrefixedId(prefix: string): string {
    const value = prefix.trim()
    const token = createResourceId().replace(/-/g, '')
    return value ? `${value}_${token}` : token
}
