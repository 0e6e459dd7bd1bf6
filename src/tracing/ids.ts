import type { SpanView } from './types.js'

interface ParsedId {
    traceId: string
    spanId: string
    rootId: string
}

function parseId(id: string | undefined): ParsedId | undefined {
    if (!id) return undefined

    if (id.startsWith('|')) {
        const end = id.indexOf('.')
        const rootId = end === -1 ? id.slice(1) : id.slice(1, end)
        return { traceId: rootId, spanId: id, rootId }
    }

    // version-traceid-spanid-flags, not validated
    const parts = id.split('-')
    if (parts.length === 4 && parts[1] && parts[2]) {
        return { traceId: parts[1], spanId: parts[2], rootId: parts[1] }
    }

    return undefined
}

export function getTraceId(span: SpanView): string | undefined {
    return span.traceId ?? parseId(span.id)?.traceId
}

export function getSpanId(span: SpanView): string | undefined {
    return span.spanId ?? parseId(span.id)?.spanId
}

export function getRootId(span: SpanView): string | undefined {
    return span.rootId ?? parseId(span.id)?.rootId
}

export function getParentId(span: SpanView): string | undefined {
    return span.parentId ?? span.parent?.id
}

export function getParentSpanId(span: SpanView): string | undefined {
    if (span.parentSpanId) return span.parentSpanId
    const fromParentId = span.parentId ? parseId(span.parentId)?.spanId : undefined
    if (fromParentId) return fromParentId
    return span.parent ? getSpanId(span.parent) : undefined
}
