import { ConfigError } from '../core/errors.js'

export const SPAN_PROPERTIES = [
    'Id',
    'TraceId',
    'SpanId',
    'OperationName',
    'DisplayName',
    'StartTimeUtc',
    'Duration',
    'DurationMs',
    'Baggage',
    'Tags',
    'ParentId',
    'ParentSpanId',
    'RootId',
    'TraceState',
    'TraceStateString',
    'ActivityTraceFlags',
    'Events',
    'CustomProperty',
    'SourceName',
    'SourceVersion',
    'ActivityKind',
    'Status',
    'StatusDescription',
    'IsAllDataRequested',
] as const

export type SpanProperty = (typeof SPAN_PROPERTIES)[number]

export const DEFAULT_SPAN_PROPERTY: SpanProperty = 'TraceId'

const PROPERTY_ALIASES: Record<string, SpanProperty> = {
    traceflags: 'ActivityTraceFlags',
    kind: 'ActivityKind',
    statuscode: 'Status',
}

const PROPERTIES_BY_NAME = new Map<string, SpanProperty>(SPAN_PROPERTIES.map((name) => [name.toLowerCase(), name]))

/** Properties that read a single entry named by `item`. */
export const ITEM_PROPERTIES: ReadonlySet<SpanProperty> = new Set<SpanProperty>(['Baggage', 'Tags', 'CustomProperty'])

export function resolveSpanProperty(name: string): SpanProperty | undefined {
    const key = name.trim().toLowerCase()
    return PROPERTIES_BY_NAME.get(key) ?? PROPERTY_ALIASES[key]
}

export function parseSpanProperty(name: string): SpanProperty {
    const property = resolveSpanProperty(name)
    if (!property) {
        throw new ConfigError(`Unknown span property "${name}". Expected one of: ${SPAN_PROPERTIES.join(', ')}`)
    }
    return property
}
