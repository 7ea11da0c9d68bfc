import type { Identifier, ResourceDocument } from '#protocol'
import { isPlainObject } from '#shared'

/** Parameter name → raw values, in the order they appeared. */
export type SearchCriteria = Record<string, string[]>

type ParameterMatcher = (resource: ResourceDocument, values: string[]) => boolean

const PARAMETER_MATCHERS: Readonly<Record<string, ParameterMatcher>> = {
    identifier: (resource, values) => matchesIdentifier(resource, values)
}

export const SUPPORTED_SEARCH_PARAMETERS: readonly string[] = Object.keys(PARAMETER_MATCHERS)

type IdentifierToken = {
    system?: string
    value: string
}

function decodeQuery(query: string): string {
    const spaced = query.replace(/\+/g, ' ')
    try {
        return decodeURIComponent(spaced)
    } catch {
        return spaced
    }
}

export function parseIdentifierToken(token: string): IdentifierToken {
    const pipe = token.indexOf('|')
    if (pipe < 0) return { value: token }
    return { system: token.slice(0, pipe), value: token.slice(pipe + 1) }
}

function isIdentifier(value: unknown): value is Identifier {
    if (!isPlainObject(value)) return false
    const { system, value: tokenValue } = value
    return (system === undefined || typeof system === 'string')
        && (tokenValue === undefined || typeof tokenValue === 'string')
}

function readIdentifiers(resource: ResourceDocument): Identifier[] {
    const list: unknown = resource.identifier
    if (!Array.isArray(list)) return []
    return list.filter(isIdentifier)
}

function matchesIdentifier(resource: ResourceDocument, tokens: string[]): boolean {
    const identifiers = readIdentifiers(resource)
    return tokens.some(raw => {
        const token = parseIdentifierToken(raw)
        return identifiers.some(identifier => {
            if (identifier.value !== token.value) return false
            return token.system === undefined || identifier.system === token.system
        })
    })
}

export class SearchMatcher {
    /**
     * `key1=val1&key2=val2`; the whole string is form-decoded (`+` is a space) before splitting.
     * Pairs without `=` are dropped and repeated keys accumulate.
     */
    parse(query: string | undefined): SearchCriteria {
        const criteria: SearchCriteria = {}
        const raw = String(query ?? '').replace(/^\?/, '')
        if (!raw) return criteria

        for (const pair of decodeQuery(raw).split('&')) {
            const eq = pair.indexOf('=')
            if (eq < 0) continue
            const key = pair.slice(0, eq)
            const value = pair.slice(eq + 1)
            const values = criteria[key] ?? (criteria[key] = [])
            values.push(value)
        }
        return criteria
    }

    /**
     * Every parameter must hold. Unsupported parameters never match, so an unknown filter yields no results.
     */
    matches(resource: ResourceDocument, criteria: SearchCriteria): boolean {
        return Object.entries(criteria).every(([name, values]) => {
            const matcher = Object.hasOwn(PARAMETER_MATCHERS, name) ? PARAMETER_MATCHERS[name] : undefined
            return matcher ? matcher(resource, values) : false
        })
    }

    search<T extends ResourceDocument>(resources: Iterable<T>, criteria: SearchCriteria): T[] {
        const out: T[] = []
        for (const resource of resources) {
            if (this.matches(resource, criteria)) out.push(resource)
        }
        return out
    }
}
