function trimTrailingSlashes(path: string): string {
    return path.replace(/\/+$/g, '')
}

/**
 * Normalize a base URL for prefix matching and `location` strings.
 * - If parseable, keep `origin + pathname` (without trailing slash).
 * - Otherwise, fall back to trimming trailing slashes from the raw string.
 */
export function normalizeBaseUrl(url: string): string {
    const raw = String(url || '').trim()
    if (!raw) return ''
    try {
        const u = new URL(raw)
        return `${u.origin}${trimTrailingSlashes(u.pathname)}`
    } catch {
        return trimTrailingSlashes(raw)
    }
}

export function joinUrl(baseUrl: string, ...segments: string[]): string {
    const base = trimTrailingSlashes(baseUrl)
    const rest = segments
        .map(s => s.replace(/^\/+|\/+$/g, ''))
        .filter(Boolean)
        .join('/')
    return rest ? `${base}/${rest}` : base
}
