import type { TextSink } from '../tracing/types.js'

export class TextBuilder implements TextSink {
    private parts: string[] = []

    append(text: string): this {
        if (text.length > 0) this.parts.push(text)
        return this
    }

    get length(): number {
        let total = 0
        for (const part of this.parts) total += part.length
        return total
    }

    toString(): string {
        return this.parts.join('')
    }
}
