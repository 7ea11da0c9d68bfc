import { isPlainObject, parseOrThrow, z } from '#shared'
import type { Meta, StoredResource } from '#protocol'
import type { ResourceModel } from './types'

const metaSchema = z.object({
    versionId: z.string().optional(),
    lastUpdated: z.string().optional()
}).loose()

type ModelMeta = Partial<Meta>

export class SchemaResourceModel<TFields extends Record<string, unknown>> implements ResourceModel {
    constructor(
        readonly resourceType: string,
        public fields: TFields,
        public id?: string,
        public meta?: ModelMeta
    ) {}

    toResource(): Record<string, unknown> {
        return {
            resourceType: this.resourceType,
            ...(this.id !== undefined ? { id: this.id } : {}),
            ...(this.meta !== undefined ? { meta: { ...this.meta } } : {}),
            ...this.fields
        }
    }
}

export type ResourceModelDefinition<TFields extends Record<string, unknown>> = {
    resourceType: string
    create: (fields: TFields, id?: string) => SchemaResourceModel<TFields>
    parse: (input: unknown) => SchemaResourceModel<TFields>
    fromResource: (resource: StoredResource) => SchemaResourceModel<TFields>
}

/**
 * Typed model backed by a zod schema describing every field except `resourceType`, `id` and `meta`.
 * Fields the schema does not declare are dropped when a document is parsed.
 */
export function defineResourceModel<TSchema extends z.ZodType<Record<string, unknown>>>(
    resourceType: string,
    schema: TSchema
): ResourceModelDefinition<z.output<TSchema>> {
    const prefix = `[${resourceType}] `
    const fieldErrors = { prefix, heading: 'invalid resource fields:' }
    const metaErrors = { prefix, heading: 'invalid meta:' }

    const parse = (input: unknown): SchemaResourceModel<z.output<TSchema>> => {
        if (!isPlainObject(input)) {
            throw new Error(`${prefix}expected a resource object`)
        }
        const { resourceType: inputType, id, meta, ...rest } = input
        if (inputType !== undefined && inputType !== resourceType) {
            throw new Error(`${prefix}cannot parse a ${String(inputType)} resource`)
        }
        const fields = parseOrThrow(schema, rest, fieldErrors)
        const parsedMeta = meta === undefined ? undefined : parseOrThrow(metaSchema, meta, metaErrors)
        return new SchemaResourceModel(
            resourceType,
            fields,
            typeof id === 'string' && id ? id : undefined,
            parsedMeta
        )
    }

    return {
        resourceType,
        create: (fields, id) => new SchemaResourceModel(resourceType, parseOrThrow(schema, fields, fieldErrors), id),
        parse,
        fromResource: (resource) => parse(resource)
    }
}
