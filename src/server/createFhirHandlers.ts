import { errorMessage, serializeErrorForLog } from '#shared'
import { isFhirMockError } from '#protocol'
import { formatTopLevelError } from './error'
import { getHeader, handleResultToResponse, readJsonBody } from './http'
import { MockFhirServer } from './MockFhirServer'
import type { MockFhirServerConfig } from './config'

export type FhirHandlers = {
    server: MockFhirServer
    fetch: (request: Request) => Promise<Response>
}

const TRACE_HEADER = 'x-trace-id'

/**
 * Fetch-style entry point: `Request` in, `Response` out, with lifecycle hooks and request logging.
 */
export function createFhirHandlers(target: MockFhirServer | MockFhirServerConfig = {}): FhirHandlers {
    const server = target instanceof MockFhirServer ? target : new MockFhirServer(target)

    const fetch = async (request: Request): Promise<Response> => {
        const method = request.method.toUpperCase()
        const pathname = new URL(request.url).pathname
        const runtime = server.createRuntime({ initialTraceId: getHeader(request.headers, TRACE_HEADER) })
        const hooks = runtime.hooks
        const hookArgs = { method, pathname, traceId: runtime.traceId, requestId: runtime.requestId }

        let responded = false

        try {
            if (hooks?.onRequest) await hooks.onRequest({ ...hookArgs, request })
            runtime.observabilityContext.emit('server:request', { method, pathname })

            const body = method === 'GET' ? undefined : await readJsonBody(request)
            const result = server.handle({ method, url: request.url, headers: request.headers, body }, runtime)

            runtime.observabilityContext.emit('server:response', { status: result.status })
            const response = handleResultToResponse(result)
            responded = true
            if (hooks?.onResponse) await hooks.onResponse({ ...hookArgs, status: response.status })
            return response
        } catch (err) {
            runtime.observabilityContext.emit('server:error', { message: errorMessage(err) })
            const meta = { method, pathname, error: serializeErrorForLog(err) }
            if (isFhirMockError(err) && err.code !== 'exception') {
                runtime.logger.warn?.('request rejected', meta)
            } else {
                runtime.logger.error?.('request failed', meta)
            }

            // error-path hook failures are logged, never rethrown
            const runErrorPathHook = async (hook: string, call: () => void | Promise<void>) => {
                try {
                    await call()
                } catch (hookError) {
                    runtime.logger.error?.('hook failed', { hook, error: serializeErrorForLog(hookError) })
                }
            }

            const { onError, onResponse } = hooks ?? {}
            if (onError) await runErrorPathHook('onError', () => onError({ ...hookArgs, error: err }))

            const response = handleResultToResponse(formatTopLevelError(err))
            if (onResponse && !responded) {
                await runErrorPathHook('onResponse', () => onResponse({ ...hookArgs, status: response.status }))
            }
            return response
        }
    }

    return { server, fetch }
}
