export { loadConfig } from './config/loader.js'
export { createFieldRenderers, parseLayoutOptions, toLayoutOptions } from './config/renderers.js'
export type { Config, FieldConfig, LogLevel, ResolvedConfig } from './config/schema.js'
export { ConfigError, LayoutFormatError, SpanFileError, SpanLayoutError, errorMessage } from './core/errors.js'
export type { ErrorKind } from './core/errors.js'
export { MockFileSystem, NodeFileSystem, type FileSystem } from './core/fs.js'
export {
    convertToText,
    escapeQuotes,
    getCollectionItem,
    renderEventsFlat,
    renderEventsJson,
    renderKeyValuesFlat,
    renderKeyValuesJson,
} from './layout/collections.js'
export { Culture } from './layout/culture.js'
export { ensureDurationMsCache, getElapsedMs, renderDurationMs } from './layout/duration.js'
export { SPAN_KIND_ENUM, STATUS_CODE_ENUM, TRACE_FLAGS_ENUM, defineEnum, formatEnumValue } from './layout/enums.js'
export type { EnumTable } from './layout/enums.js'
export { formatDate, formatNumber, formatTimeSpan } from './layout/formatting.js'
export { SPAN_PROPERTIES, parseSpanProperty, resolveSpanProperty, type SpanProperty } from './layout/properties.js'
export { MAX_ANCESTOR_DEPTH, SpanLayoutRenderer, type SpanLayoutOptions } from './layout/renderer.js'
export { TextBuilder } from './layout/text-builder.js'
export { createDiagnosticsLogger, createLogger, type Logger } from './logger/index.js'
export { createSpanMixin, type SpanMixinOptions } from './logger/span-mixin.js'
export { asyncLocalSpanProvider, currentSpan, runWithSpan, staticSpanProvider } from './tracing/context.js'
export { getParentId, getParentSpanId, getRootId, getSpanId, getTraceId } from './tracing/ids.js'
export { SpanFileSchema, loadSpanFile, parseSpanFile, type SpanFile } from './tracing/span-file.js'
export { SpanRecord, type SpanRecordInit } from './tracing/span-record.js'
export type {
    KeyValue,
    SpanEvent,
    SpanKind,
    SpanSource,
    SpanView,
    StatusCode,
    TextSink,
    TraceContextProvider,
    TraceFlags,
} from './tracing/types.js'
