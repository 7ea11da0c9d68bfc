import { z } from '#shared'

export const resourceDocumentSchema = z.object({
    resourceType: z.string().min(1, 'resourceType is required'),
    id: z.string().optional()
}).loose()

export const bundleRequestSchema = z.object({
    method: z.string().optional(),
    url: z.string().optional(),
    ifNoneExist: z.string().optional()
}).loose()

export const bundleEntrySchema = z.object({
    request: bundleRequestSchema.optional(),
    resource: z.record(z.string(), z.unknown()).optional()
}).loose()

/**
 * Entries are validated one at a time so a malformed entry only fails itself.
 */
export const bundleSchema = z.object({
    resourceType: z.literal('Bundle').optional(),
    type: z.string().optional(),
    entry: z.array(z.unknown()).optional()
}).loose()

export type BundleEntryInput = z.output<typeof bundleEntrySchema>
export type BundleInput = z.output<typeof bundleSchema>
