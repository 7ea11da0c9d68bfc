import { error } from './error'
import * as bundle from './bundle'
import * as outcome from './outcome'
import * as status from './status'
import { parseRequestTarget } from './url'

export const Protocol = {
    error,
    outcome: {
        information: outcome.information,
        error: outcome.error,
        write: outcome.write
    },
    bundle: {
        searchset: bundle.searchset,
        response: bundle.response,
        responseType: bundle.responseType
    },
    status: {
        token: status.statusToken,
        reason: status.reasonPhrase,
        write: status.writeStatus
    },
    url: {
        parse: parseRequestTarget
    }
} as const
