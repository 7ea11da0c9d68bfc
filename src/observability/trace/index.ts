export { createTraceId, deriveRequestId } from './fns'
