export type RequestTarget = {
    /** Path segments after the base path, percent-decoded. */
    segments: string[]
    resourceType?: string
    id?: string
    /** Raw query string without the leading `?`; empty when absent. */
    query: string
}

function decodeSegment(segment: string): string {
    try {
        return decodeURIComponent(segment)
    } catch {
        return segment
    }
}

function pathnameOf(path: string): string {
    if (!/^[a-z][a-z0-9+.-]*:\/\//i.test(path)) return path
    try {
        return new URL(path).pathname
    } catch {
        return path
    }
}

function stripBasePath(pathname: string, basePath: string | undefined): string {
    const base = (basePath ?? '').replace(/\/+$/g, '')
    if (!base || base === '/') return pathname
    const normalized = pathname.startsWith('/') ? pathname : `/${pathname}`
    if (normalized === base) return '/'
    if (normalized.startsWith(`${base}/`)) return normalized.slice(base.length)
    return pathname
}

/**
 * Split a request url (absolute, rooted or relative like `Patient?identifier=x`) into kind, id and raw query.
 * The query is cut from the raw string before any URL parsing so it reaches the search parser untouched.
 */
export function parseRequestTarget(url: string, basePath?: string): RequestTarget {
    const raw = String(url ?? '').trim()
    const hashIndex = raw.indexOf('#')
    const withoutHash = hashIndex >= 0 ? raw.slice(0, hashIndex) : raw
    const queryIndex = withoutHash.indexOf('?')
    const path = queryIndex >= 0 ? withoutHash.slice(0, queryIndex) : withoutHash
    const query = queryIndex >= 0 ? withoutHash.slice(queryIndex + 1) : ''

    const pathname = stripBasePath(pathnameOf(path), basePath)
    const segments = pathname.split('/').filter(Boolean).map(decodeSegment)

    return {
        segments,
        ...(segments[0] !== undefined ? { resourceType: segments[0] } : {}),
        ...(segments[1] !== undefined ? { id: segments[1] } : {}),
        query
    }
}
