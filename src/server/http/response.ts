import type { HandleResult } from './types'

export function handleResultToResponse(result: HandleResult): Response {
    const headers = new Headers(result.headers)
    const body = result.body === undefined ? null : JSON.stringify(result.body)
    return new Response(body, { status: result.status, headers })
}
