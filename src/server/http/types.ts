export type HeaderSource = Headers | Record<string, string | undefined>

/**
 * One inbound call. `url` may be absolute or relative to the server root; `body` is already-parsed JSON.
 */
export type HandleRequest = {
    method: string
    url: string
    headers?: HeaderSource
    body?: unknown
}

export type HandleResult = {
    status: number
    headers: Record<string, string>
    body: unknown
}
