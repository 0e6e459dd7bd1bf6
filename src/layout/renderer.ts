import { getParentId, getParentSpanId, getRootId, getSpanId, getTraceId } from '../tracing/ids.js'
import type { SpanView, TextSink } from '../tracing/types.js'
import {
    JSON_FORMAT,
    convertToText,
    getCollectionItem,
    renderEventsFlat,
    renderEventsJson,
    renderKeyValuesFlat,
    renderKeyValuesJson,
} from './collections.js'
import { Culture } from './culture.js'
import { ensureDurationMsCache, getElapsedMs, renderDurationMs } from './duration.js'
import { SPAN_KIND_ENUM, STATUS_CODE_ENUM, TRACE_FLAGS_ENUM, formatEnumValue } from './enums.js'
import { formatDate, formatTimeSpan, isValidDate } from './formatting.js'
import { DEFAULT_SPAN_PROPERTY, type SpanProperty } from './properties.js'
import { TextBuilder } from './text-builder.js'

// Upper bound on parent hops when walking to the root
export const MAX_ANCESTOR_DEPTH = 1024

export interface SpanLayoutOptions {
    property?: SpanProperty
    /** Entry to read from baggage, tags or custom properties. */
    item?: string
    format?: string
    culture?: Culture
    /** Read from the parent of the current span. */
    parent?: boolean
    /** After `parent` is applied, walk up to the top-most ancestor. */
    root?: boolean
    /** Milliseconds since the epoch, used for spans that have not ended. */
    clock?: () => number
}

/**
 * Renders one field of a span. Absent spans and absent entries render
 * nothing; only an unsupported format string raises.
 */
export class SpanLayoutRenderer {
    readonly property: SpanProperty
    readonly item: string | undefined
    readonly format: string | undefined
    readonly culture: Culture
    readonly parent: boolean
    readonly root: boolean
    private readonly clock: () => number

    constructor(options: SpanLayoutOptions = {}) {
        this.property = options.property ?? DEFAULT_SPAN_PROPERTY
        this.item = options.item
        this.format = options.format
        this.culture = options.culture ?? Culture.invariant
        this.parent = options.parent ?? false
        this.root = options.root ?? false
        this.clock = options.clock ?? Date.now
        this.initialize()
    }

    private initialize(): void {
        if (this.property === 'DurationMs') {
            ensureDurationMsCache()
        }
    }

    resolveSpan(current: SpanView | undefined): SpanView | undefined {
        let span = this.parent ? current?.parent : current

        if (this.root && span) {
            let parent = span.parent
            for (let depth = 0; parent && depth < MAX_ANCESTOR_DEPTH; depth++) {
                span = parent
                parent = span.parent
            }
        }

        return span
    }

    append(sink: TextSink, current: SpanView | undefined): void {
        const span = this.resolveSpan(current)
        if (!span) return

        const asJson = this.format === JSON_FORMAT
        const hasItem = !!this.item

        if (this.property === 'Baggage' && !hasItem) {
            if (asJson) renderKeyValuesJson(span.baggage, sink)
            else renderKeyValuesFlat(span.baggage, sink)
        } else if (this.property === 'Tags' && !hasItem) {
            if (asJson) renderKeyValuesJson(span.tags, sink)
            else renderKeyValuesFlat(span.tags, sink)
        } else if (this.property === 'Events') {
            if (asJson) renderEventsJson(span.events, sink)
            else renderEventsFlat(span.events, sink)
        } else if (this.property === 'DurationMs') {
            const elapsed = getElapsedMs(span, this.clock())
            if (elapsed !== undefined) renderDurationMs(sink, elapsed, this.format, this.culture)
        } else {
            const value = this.getValue(span)
            if (value) sink.append(value)
        }
    }

    render(current: SpanView | undefined): string {
        const builder = new TextBuilder()
        this.append(builder, current)
        return builder.toString()
    }

    private getValue(span: SpanView): string | undefined {
        switch (this.property) {
            case 'Id':
                return span.id
            case 'TraceId':
                return getTraceId(span)
            case 'SpanId':
                return getSpanId(span)
            case 'OperationName':
                return span.operationName
            case 'DisplayName':
                return span.displayName ?? span.operationName
            case 'StartTimeUtc':
                return isValidDate(span.startTime) ? formatDate(span.startTime, this.format, this.culture) : ''
            case 'Duration':
                return this.getDuration(span)
            case 'ParentId':
                return getParentId(span)
            case 'ParentSpanId':
                return getParentSpanId(span)
            case 'RootId':
                return getRootId(span)
            case 'TraceState':
            case 'TraceStateString':
                return span.traceState
            case 'ActivityTraceFlags':
                return formatEnumValue(TRACE_FLAGS_ENUM, span.traceFlags, this.format)
            case 'Baggage':
                return getCollectionItem(this.item ?? '', span.baggage)
            case 'Tags':
                return getCollectionItem(this.item ?? '', span.tags)
            case 'CustomProperty':
                return this.getCustomProperty(span)
            case 'SourceName':
                return span.source?.name
            case 'SourceVersion':
                return span.source?.version
            case 'ActivityKind':
                return formatEnumValue(SPAN_KIND_ENUM, span.kind, this.format)
            case 'Status':
                return formatEnumValue(STATUS_CODE_ENUM, span.status, this.format)
            case 'StatusDescription':
                return span.statusDescription ?? ''
            case 'IsAllDataRequested':
                return span.isAllDataRequested ? '1' : '0'
            default:
                return ''
        }
    }

    private getDuration(span: SpanView): string {
        const elapsed = getElapsedMs(span, this.clock())
        if (elapsed === undefined) return ''
        return formatTimeSpan(elapsed, this.format, this.culture)
    }

    private getCustomProperty(span: SpanView): string {
        const item = this.item
        if (!item) return ''

        return convertToText(span.getCustomProperty(item)) ?? convertToText(span.parent?.getCustomProperty(item)) ?? ''
    }
}
