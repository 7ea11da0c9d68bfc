export { createPrefixedId, createResourceId } from './id'
export { z, formatZodErrorMessage, parseOrThrow } from './zod'
export type { ZodErrorMessageArgs } from './zod'
export { joinUrl, normalizeBaseUrl } from './url'
export { errorMessage, serializeErrorForLog, toError } from './errors'
export { cloneDocument, isPlainObject } from './object'
export { childLogger, createNoopLogger } from './logger'
export type { FhirMockLogger, LogMeta } from './logger'
