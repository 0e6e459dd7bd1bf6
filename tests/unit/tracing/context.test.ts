import { describe, expect, it } from 'vitest'
import { asyncLocalSpanProvider, currentSpan, runWithSpan, staticSpanProvider } from '../../../src/tracing/context.js'
import { createSpanTree } from '../../helpers/spans.js'

describe('span context', () => {
    it('has no current span outside runWithSpan', () => {
        expect(currentSpan()).toBeUndefined()
        expect(asyncLocalSpanProvider.current()).toBeUndefined()
    })

    it('propagates the span through async continuations', async () => {
        const { child } = createSpanTree()
        const seen = await runWithSpan(child, async () => {
            await new Promise((resolve) => setTimeout(resolve, 5))
            return asyncLocalSpanProvider.current()
        })
        expect(seen).toBe(child)
    })

    it('shadows the outer span in nested calls', () => {
        const { child, leaf } = createSpanTree()
        runWithSpan(child, () => {
            runWithSpan(leaf, () => {
                expect(currentSpan()).toBe(leaf)
            })
            expect(currentSpan()).toBe(child)
        })
    })

    it('serves a fixed span', () => {
        const { root } = createSpanTree()
        expect(staticSpanProvider(root).current()).toBe(root)
        expect(staticSpanProvider(undefined).current()).toBeUndefined()
    })
})
