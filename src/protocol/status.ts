const REASON_PHRASES: Readonly<Record<number, string>> = {
    200: 'OK',
    201: 'Created',
    400: 'Bad Request',
    404: 'Not Found',
    412: 'Precondition Failed',
    500: 'Internal Server Error'
}

export function reasonPhrase(status: number): string {
    return REASON_PHRASES[status] ?? 'Unknown'
}

/**
 * Bundle entries report their status as `"<code> <reason>"`, e.g. `"201 Created"`.
 */
export function statusToken(status: number): string {
    return `${status} ${reasonPhrase(status)}`
}

export function writeStatus(created: boolean): number {
    return created ? 201 : 200
}
