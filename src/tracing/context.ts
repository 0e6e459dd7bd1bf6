import { AsyncLocalStorage } from 'node:async_hooks'
import type { SpanView, TraceContextProvider } from './types.js'

const storage = new AsyncLocalStorage<SpanView>()

/**
 * Binds `span` as the current span for `fn` and every async continuation it starts.
 * Nested calls shadow the outer span until they return.
 */
export function runWithSpan<T>(span: SpanView, fn: () => T): T {
    return storage.run(span, fn)
}

export function currentSpan(): SpanView | undefined {
    return storage.getStore()
}

export const asyncLocalSpanProvider: TraceContextProvider = {
    current: currentSpan,
}

export function staticSpanProvider(span: SpanView | undefined): TraceContextProvider {
    return { current: () => span }
}
