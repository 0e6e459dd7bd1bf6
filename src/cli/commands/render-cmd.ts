import { parseLayoutOptions } from '../../config/renderers.js'
import type { FileSystem } from '../../core/fs.js'
import { DEFAULT_SPAN_PROPERTY } from '../../layout/properties.js'
import { SpanLayoutRenderer } from '../../layout/renderer.js'
import { loadSpanFile } from '../../tracing/span-file.js'

export interface RenderFlags {
    property?: string
    item?: string
    format?: string
    culture?: string
    parent?: boolean
    root?: boolean
}

export async function renderCommand(
    fs: FileSystem,
    spanFile: string,
    flags: RenderFlags,
    clock?: () => number
): Promise<string> {
    const span = await loadSpanFile(fs, spanFile)
    const options = parseLayoutOptions({
        property: flags.property ?? DEFAULT_SPAN_PROPERTY,
        item: flags.item,
        format: flags.format,
        culture: flags.culture,
        parent: flags.parent,
        root: flags.root,
    })
    return new SpanLayoutRenderer({ ...options, clock }).render(span)
}
