import type { KeyValue, SpanEvent, TextSink } from '../tracing/types.js'
import { Culture } from './culture.js'
import { formatDate, isValidDate } from './formatting.js'

export const JSON_FORMAT = '@'
export const DICTIONARY_PREFIX = '{ '
export const EVENT_TAGS_PREFIX = ', "tags"={ '
export const EVENT_TIMESTAMP_PATTERN = 'yyyy-MM-dd HH:mm:ss xxx'

/** Size of arrays, maps and sets; `undefined` for lazy iterables. */
export function knownSize(collection: Iterable<unknown>): number | undefined {
    if (Array.isArray(collection)) return collection.length
    if (collection instanceof Map || collection instanceof Set) return collection.size
    return undefined
}

function isEmpty(collection: Iterable<unknown>): boolean {
    return knownSize(collection) === 0
}

function isBlank(value: string | undefined): boolean {
    return value === undefined || value.trim().length === 0
}

export function escapeQuotes(value: string): string {
    return value.replaceAll('"', '\\"')
}

function hasOwnToString(value: object): boolean {
    return typeof value.toString === 'function' && value.toString !== Object.prototype.toString
}

/**
 * Text of an arbitrary tag or baggage value. `undefined` means "no value";
 * a conversion that throws yields an empty string.
 */
export function convertToText(value: unknown): string | undefined {
    try {
        if (value === null || value === undefined) return undefined

        switch (typeof value) {
            case 'string':
                return value
            case 'number':
            case 'bigint':
            case 'boolean':
            case 'symbol':
                return String(value)
            case 'function':
                return value.name
        }

        if (value instanceof Date) return value.toISOString()
        if (Array.isArray(value)) return value.map((item) => convertToText(item) ?? '').join(',')
        if (typeof value === 'object' && hasOwnToString(value)) return String(value)
        return JSON.stringify(value)
    } catch {
        return ''
    }
}

/** First value whose key equals `item` exactly. */
export function getCollectionItem(item: string, collection: Iterable<KeyValue<unknown>>): string {
    if (isEmpty(collection)) return ''

    for (const [key, value] of collection) {
        if (key === item) {
            return convertToText(value) ?? ''
        }
    }

    return ''
}

export function renderKeyValuesFlat(collection: Iterable<KeyValue<unknown>>, sink: TextSink): void {
    if (isEmpty(collection)) return

    let firstItem = true
    for (const [key, value] of collection) {
        if (!firstItem) sink.append(',')
        firstItem = false
        sink.append(key)

        const text = convertToText(value)
        if (text === undefined) continue

        sink.append('=').append(text)
    }
}

export function renderKeyValuesJson(
    collection: Iterable<KeyValue<unknown>>,
    sink: TextSink,
    prefix: string = DICTIONARY_PREFIX
): void {
    if (isEmpty(collection)) return

    let firstItem = true
    for (const [key, value] of collection) {
        if (isBlank(key)) continue

        sink.append(firstItem ? prefix : ', ')
        firstItem = false
        sink.append('"').append(escapeQuotes(key))

        const text = convertToText(value)
        if (text === undefined) {
            sink.append('": null')
        } else {
            sink.append('": "').append(escapeQuotes(text)).append('"')
        }
    }

    if (!firstItem) sink.append(' }')
}

export function renderEventsFlat(events: Iterable<SpanEvent>, sink: TextSink): void {
    if (isEmpty(events)) return

    let firstItem = true
    for (const event of events) {
        if (!firstItem) sink.append(', ')
        sink.append(event.name)
        firstItem = false
    }
}

/**
 * Event tags are opened with `, "tags"={ ` inside the timestamp string and the
 * event is closed with `" }`. The result is not well-formed JSON.
 */
export function renderEventsJson(events: Iterable<SpanEvent>, sink: TextSink): void {
    if (isEmpty(events)) return

    let firstItem = true
    for (const event of events) {
        if (isBlank(event.name)) continue

        sink.append(firstItem ? '[ ' : ', ')
        firstItem = false
        sink.append('{ "name": "').append(escapeQuotes(event.name))
        sink.append('", "timestamp": "')
        if (isValidDate(event.timestamp)) {
            sink.append(formatDate(event.timestamp, EVENT_TIMESTAMP_PATTERN, Culture.invariant))
        }
        renderKeyValuesJson(event.tags, sink, EVENT_TAGS_PREFIX)
        sink.append('" }')
    }

    if (!firstItem) sink.append(' ]')
}
