import type { HeaderSource } from './types'

export function getHeader(headers: HeaderSource | undefined, name: string): string | undefined {
    if (!headers) return undefined
    if (headers instanceof Headers) {
        const value = headers.get(name)
        return typeof value === 'string' ? value : undefined
    }
    const direct = headers[name]
    if (typeof direct === 'string') return direct
    const key = Object.keys(headers).find(k => k.toLowerCase() === name.toLowerCase())
    if (!key) return undefined
    const value = headers[key]
    return typeof value === 'string' ? value : undefined
}
