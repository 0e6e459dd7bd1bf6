import { createFieldRenderers } from '../../config/renderers.js'
import type { ResolvedConfig } from '../../config/schema.js'
import type { FileSystem } from '../../core/fs.js'
import type { Logger } from '../../logger/index.js'
import { createSpanMixin } from '../../logger/span-mixin.js'
import { staticSpanProvider } from '../../tracing/context.js'
import { loadSpanFile } from '../../tracing/span-file.js'

/** Renders every configured field against a span snapshot, as pino would see it. */
export async function fieldsCommand(
    fs: FileSystem,
    spanFile: string,
    config: ResolvedConfig,
    logger?: Logger
): Promise<string> {
    const span = await loadSpanFile(fs, spanFile)
    const mixin = createSpanMixin({
        fields: createFieldRenderers(config),
        provider: staticSpanProvider(span),
        logger,
    })
    return JSON.stringify(mixin(), null, 2)
}
