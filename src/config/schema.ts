import { z } from 'zod'
import { resolveSpanProperty } from '../layout/properties.js'

export const LogLevelSchema = z.enum(['silent', 'fatal', 'error', 'warn', 'info', 'debug', 'trace'])

export type LogLevel = z.infer<typeof LogLevelSchema>

export const SpanPropertySchema = z.string().transform((value, ctx) => {
    const property = resolveSpanProperty(value)
    if (!property) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Unknown span property "${value}"` })
        return z.NEVER
    }
    return property
})

export const FieldConfigSchema = z.object({
    property: SpanPropertySchema,
    item: z.string().optional(),
    format: z.string().optional(),
    culture: z.string().optional(),
    parent: z.boolean().optional(),
    root: z.boolean().optional(),
})

export type FieldConfig = z.infer<typeof FieldConfigSchema>

export const ConfigSchema = z.object({
    logLevel: LogLevelSchema.optional(),
    culture: z.string().optional(),
    fields: z.record(FieldConfigSchema).optional(),
})

export type Config = z.infer<typeof ConfigSchema>

export interface ResolvedConfig {
    logLevel: LogLevel
    culture: string
    fields: Record<string, FieldConfig>
    projectDir: string
    configDir: string
}
