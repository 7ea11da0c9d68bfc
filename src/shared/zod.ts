import { z } from 'zod/v4'

export { z }

function formatPath(path: ReadonlyArray<PropertyKey>): string {
    if (!path.length) return ''
    return path
        .map(seg => (typeof seg === 'number' ? `[${seg}]` : String(seg)))
        .join('.')
        .replace(/\.?\[(\d+)\]/g, '[$1]')
}

export type ZodErrorMessageArgs = {
    prefix?: string
    /** Line above the issue list; defaults to `invalid configuration:`. */
    heading?: string
}

export function formatZodErrorMessage(error: unknown, args: ZodErrorMessageArgs = {}): string {
    const prefix = args.prefix ?? ''

    if (!(error instanceof z.ZodError) || !error.issues.length) {
        const msg = error instanceof Error ? error.message : String(error)
        return `${prefix}${msg}`
    }

    const lines = error.issues.map(issue => {
        const p = formatPath(issue.path)
        const m = issue.message ? String(issue.message) : 'Invalid input'
        return p ? `${p}: ${m}` : m
    })

    const head = `${prefix}${args.heading ?? 'invalid configuration:'}`
    return `${head}\n- ${lines.join('\n- ')}`
}

export function parseOrThrow<TSchema extends z.ZodType>(
    schema: TSchema,
    value: unknown,
    args?: ZodErrorMessageArgs
): z.output<TSchema> {
    const result = schema.safeParse(value)
    if (result.success) return result.data
    throw new Error(formatZodErrorMessage(result.error, args))
}
