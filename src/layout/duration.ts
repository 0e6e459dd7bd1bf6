import type { SpanView, TextSink } from '../tracing/types.js'
import type { Culture } from './culture.js'
import { TICKS_PER_MILLISECOND, formatNumber, isValidDate } from './formatting.js'

export const DURATION_CACHE_SIZE = 1000
export const ONE_TICK_MS = 1 / TICKS_PER_MILLISECOND

// "0".."999", published once and never mutated
let durationMsCache: readonly string[] | undefined

export function createDurationMsCache(): readonly string[] {
    return Object.freeze(Array.from({ length: DURATION_CACHE_SIZE }, (_, i) => String(i)))
}

/** Publishes `candidate` unless a cache already exists; returns the published cache. */
export function publishDurationMsCache(candidate: readonly string[]): readonly string[] {
    if (durationMsCache === undefined) {
        durationMsCache = candidate
    }
    return durationMsCache
}

export function getDurationMsCache(): readonly string[] | undefined {
    return durationMsCache
}

export function ensureDurationMsCache(): readonly string[] {
    return durationMsCache ?? publishDurationMsCache(createDurationMsCache())
}

/**
 * Elapsed milliseconds. A zero duration means the span is still open and is
 * measured against `now`; clock skew below the start time clamps to one tick.
 */
export function getElapsedMs(span: SpanView, now: number): number | undefined {
    const startTime = span.startTime
    if (!isValidDate(startTime)) return undefined

    let duration = span.duration
    if (duration === 0) {
        duration = now - startTime.getTime()
        if (duration < 0) duration = ONE_TICK_MS
    }
    return duration
}

function appendInteger(sink: TextSink, value: number, cache: readonly string[] | undefined): void {
    sink.append(cache?.[value] ?? String(value))
}

export function renderDurationMs(sink: TextSink, durationMs: number, format: string | undefined, culture: Culture): void {
    if (!culture.isInvariant || format) {
        sink.append(formatNumber(durationMs, format, culture))
        return
    }

    const cache = durationMsCache
    const truncatedMs = Math.trunc(durationMs)
    appendInteger(sink, truncatedMs, cache)

    const preciseMs = Math.trunc((durationMs - truncatedMs) * 1000)
    if (preciseMs > 0) {
        sink.append('.')
        if (preciseMs < 100) sink.append('0')
        if (preciseMs < 10) sink.append('0')
        appendInteger(sink, preciseMs, cache)
    } else {
        sink.append('.0')
    }
}
