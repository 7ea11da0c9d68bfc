import type { ErrorCode } from '../types'

export type { ErrorCode }

export type FhirMockErrorDetails = {
    resourceType?: string
    id?: string
    method?: string
    url?: string
    criteria?: string
    matches?: number
    entryIndex?: number
    [k: string]: unknown
}
