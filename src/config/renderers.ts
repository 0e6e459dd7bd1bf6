import { ConfigError } from '../core/errors.js'
import { Culture } from '../layout/culture.js'
import { SpanLayoutRenderer, type SpanLayoutOptions } from '../layout/renderer.js'
import { type FieldConfig, FieldConfigSchema, type ResolvedConfig } from './schema.js'

export function toLayoutOptions(field: FieldConfig, defaultCulture?: string): SpanLayoutOptions {
    return {
        property: field.property,
        item: field.item,
        format: field.format,
        culture: Culture.get(field.culture ?? defaultCulture),
        parent: field.parent,
        root: field.root,
    }
}

/** Validates untyped renderer options, e.g. from a JSON document or CLI flags. */
export function parseLayoutOptions(raw: unknown, defaultCulture?: string): SpanLayoutOptions {
    const result = FieldConfigSchema.safeParse(raw)
    if (!result.success) {
        const issues = result.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
        throw new ConfigError(`Invalid layout options: ${issues.join('; ')}`)
    }
    return toLayoutOptions(result.data, defaultCulture)
}

export function createFieldRenderers(config: Pick<ResolvedConfig, 'fields' | 'culture'>): Map<string, SpanLayoutRenderer> {
    const renderers = new Map<string, SpanLayoutRenderer>()
    for (const [name, field] of Object.entries(config.fields)) {
        renderers.set(name, new SpanLayoutRenderer(toLayoutOptions(field, config.culture)))
    }
    return renderers
}
