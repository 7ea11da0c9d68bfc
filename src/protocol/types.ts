export type Identifier = {
    system?: string
    value?: string
    [field: string]: unknown
}

export type Meta = {
    versionId: string
    lastUpdated: string
    [field: string]: unknown
}

/**
 * A FHIR resource as plain JSON. `resourceType` is the kind that partitions the store.
 */
export type ResourceDocument = {
    resourceType: string
    id?: string
    meta?: Partial<Meta>
    /** Business identifiers, searched by `identifier=[system|]value`. Entries are `Identifier` shaped. */
    identifier?: unknown
    [field: string]: unknown
}

export type StoredResource = ResourceDocument & {
    id: string
    meta: Meta
}

export type IssueSeverity = 'fatal' | 'error' | 'warning' | 'information'

export type ErrorCode =
    | 'not-found'
    | 'invalid'
    | 'not-supported'
    | 'multiple-matches'
    | 'exception'

export type IssueCode = 'informational' | ErrorCode

export type OperationOutcomeIssue = {
    severity: IssueSeverity
    code: IssueCode
    diagnostics?: string
}

export type OperationOutcome = {
    resourceType: 'OperationOutcome'
    issue: OperationOutcomeIssue[]
}

export type WriteOutcome = OperationOutcome & {
    location: string
    created: boolean
    created_resource: StoredResource
}

export type BundleRequest = {
    method: string
    url: string
    ifNoneExist?: string
}

export type SearchsetEntry = {
    fullUrl: string
    resource: StoredResource
}

export type SearchsetBundle = {
    resourceType: 'Bundle'
    type: 'searchset'
    total: number
    entry: SearchsetEntry[]
}

export type BundleEntryResponse = {
    status: string
    location?: string
    outcome?: OperationOutcome | WriteOutcome
}

export type BundleResponseEntry = {
    response: BundleEntryResponse
    resource?: StoredResource | SearchsetBundle
}

export type ResponseBundle = {
    resourceType: 'Bundle'
    type: string
    entry: BundleResponseEntry[]
}

export const FHIR_JSON_CONTENT_TYPE = 'application/fhir+json'
