import type { KeyValue, SpanEvent, SpanKind, SpanSource, SpanView, StatusCode, TraceFlags } from './types.js'

export interface SpanRecordInit {
    id?: string
    traceId?: string
    spanId?: string
    parentId?: string
    parentSpanId?: string
    rootId?: string
    operationName: string
    displayName?: string
    startTime?: Date
    duration?: number
    traceState?: string
    traceFlags?: TraceFlags
    kind?: SpanKind
    status?: StatusCode
    statusDescription?: string
    source?: SpanSource
    isAllDataRequested?: boolean
    baggage?: KeyValue<string | undefined>[]
    tags?: KeyValue<unknown>[]
    events?: SpanEvent[]
    parent?: SpanView
    customProperties?: Record<string, unknown>
}

/**
 * Plain-data span. Used for span snapshots read from disk and as a
 * stand-in for a tracing library's span in tests.
 */
export class SpanRecord implements SpanView {
    id?: string
    traceId?: string
    spanId?: string
    parentId?: string
    parentSpanId?: string
    rootId?: string
    operationName: string
    displayName?: string
    startTime?: Date
    duration: number
    traceState?: string
    traceFlags: TraceFlags
    kind: SpanKind
    status: StatusCode
    statusDescription?: string
    source?: SpanSource
    isAllDataRequested: boolean
    baggage: KeyValue<string | undefined>[]
    tags: KeyValue<unknown>[]
    events: SpanEvent[]
    parent?: SpanView
    private customProperties: Map<string, unknown>

    constructor(init: SpanRecordInit) {
        this.id = init.id
        this.traceId = init.traceId
        this.spanId = init.spanId
        this.parentId = init.parentId
        this.parentSpanId = init.parentSpanId
        this.rootId = init.rootId
        this.operationName = init.operationName
        this.displayName = init.displayName
        this.startTime = init.startTime
        this.duration = init.duration ?? 0
        this.traceState = init.traceState
        this.traceFlags = init.traceFlags ?? 'None'
        this.kind = init.kind ?? 'Internal'
        this.status = init.status ?? 'Unset'
        this.statusDescription = init.statusDescription
        this.source = init.source
        this.isAllDataRequested = init.isAllDataRequested ?? false
        this.baggage = init.baggage ?? []
        this.tags = init.tags ?? []
        this.events = init.events ?? []
        this.parent = init.parent
        this.customProperties = new Map(Object.entries(init.customProperties ?? {}))
    }

    getCustomProperty(name: string): unknown {
        return this.customProperties.get(name)
    }

    setCustomProperty(name: string, value: unknown): void {
        if (value === undefined) {
            this.customProperties.delete(name)
        } else {
            this.customProperties.set(name, value)
        }
    }
}
