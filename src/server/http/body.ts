import { errorMessage } from '#shared'
import { throwError } from '#protocol'

/**
 * Empty bodies read as `undefined`; anything that is not JSON is an `invalid` request.
 */
export async function readJsonBody(request: Pick<Request, 'text'>): Promise<unknown> {
    const text = await request.text()
    if (!text.trim()) return undefined
    try {
        return JSON.parse(text)
    } catch (err) {
        throwError('invalid', `Invalid JSON body: ${errorMessage(err)}`)
    }
}
