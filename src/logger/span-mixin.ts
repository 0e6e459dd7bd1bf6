import { errorMessage } from '../core/errors.js'
import type { SpanLayoutRenderer } from '../layout/renderer.js'
import { asyncLocalSpanProvider } from '../tracing/context.js'
import type { TraceContextProvider } from '../tracing/types.js'
import type { Logger } from './index.js'

export interface SpanMixinOptions {
    fields: ReadonlyMap<string, SpanLayoutRenderer>
    provider?: TraceContextProvider
    /** Receives one warning per field whose renderer throws. */
    logger?: Logger
}

/**
 * pino `mixin` that adds one property per field with the rendered span text.
 * Fields that render empty are left out.
 */
export function createSpanMixin(options: SpanMixinOptions): () => Record<string, string> {
    const fields = [...options.fields]
    const provider = options.provider ?? asyncLocalSpanProvider
    const failed = new Set<string>()

    return () => {
        const output: Record<string, string> = {}
        const current = provider.current()
        if (!current) return output

        for (const [name, renderer] of fields) {
            try {
                const text = renderer.render(current)
                if (text) output[name] = text
            } catch (error) {
                if (failed.has(name)) continue
                failed.add(name)
                options.logger?.warn(
                    { field: name, property: renderer.property, format: renderer.format, error: errorMessage(error) },
                    'span-layout:render-failed'
                )
            }
        }

        return output
    }
}
