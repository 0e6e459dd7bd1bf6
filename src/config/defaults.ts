import type { ResolvedConfig } from './schema.js'

export const DEFAULT_CONFIG: Omit<ResolvedConfig, 'projectDir' | 'configDir'> = {
    logLevel: 'info',
    culture: 'invariant',
    fields: {
        traceId: { property: 'TraceId' },
        spanId: { property: 'SpanId' },
    },
}

export const CONFIG_DIR = `${process.env.HOME ?? '~'}/.config/span-layout`
export const GLOBAL_CONFIG_FILE = `${CONFIG_DIR}/config.json`
export const LOCAL_CONFIG_FILE = 'span-layout.config.json'
