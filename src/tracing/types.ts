export const TRACE_FLAGS = ['None', 'Recorded'] as const
export const SPAN_KINDS = ['Internal', 'Server', 'Client', 'Producer', 'Consumer'] as const
export const STATUS_CODES = ['Unset', 'Ok', 'Error'] as const

export type TraceFlags = (typeof TRACE_FLAGS)[number]
export type SpanKind = (typeof SPAN_KINDS)[number]
export type StatusCode = (typeof STATUS_CODES)[number]

export type KeyValue<T> = readonly [key: string, value: T]

export interface SpanEvent {
    name: string
    timestamp: Date
    tags: Iterable<KeyValue<unknown>>
}

export interface SpanSource {
    name: string
    version?: string
}

/**
 * Read-only view of a span owned by the tracing library.
 * `duration` is in milliseconds; zero means the span has not ended.
 */
export interface SpanView {
    readonly id?: string
    readonly traceId?: string
    readonly spanId?: string
    readonly parentId?: string
    readonly parentSpanId?: string
    readonly rootId?: string
    readonly operationName: string
    readonly displayName?: string
    readonly startTime?: Date
    readonly duration: number
    readonly traceState?: string
    readonly traceFlags: TraceFlags
    readonly kind: SpanKind
    readonly status: StatusCode
    readonly statusDescription?: string
    readonly source?: SpanSource
    readonly isAllDataRequested: boolean
    readonly baggage: Iterable<KeyValue<string | undefined>>
    readonly tags: Iterable<KeyValue<unknown>>
    readonly events: Iterable<SpanEvent>
    readonly parent?: SpanView
    getCustomProperty(name: string): unknown
}

export interface TraceContextProvider {
    current(): SpanView | undefined
}

export interface TextSink {
    append(text: string): TextSink
}
