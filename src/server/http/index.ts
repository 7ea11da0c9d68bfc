export { readJsonBody } from './body'
export { getHeader } from './headers'
export { handleResultToResponse } from './response'
export type { HandleRequest, HandleResult, HeaderSource } from './types'
