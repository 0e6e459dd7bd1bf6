import { z } from 'zod'
import { SpanFileError } from '../core/errors.js'
import type { FileSystem } from '../core/fs.js'
import { SpanRecord } from './span-record.js'
import { type KeyValue, type SpanKind, type StatusCode, type TraceFlags, SPAN_KINDS, STATUS_CODES, TRACE_FLAGS } from './types.js'

type Pairs<T> = Array<[string, T]> | Record<string, T>

interface SpanEventFile {
    name: string
    timestamp: string
    tags?: Pairs<unknown>
}

export interface SpanFile {
    id?: string
    traceId?: string
    spanId?: string
    parentId?: string
    parentSpanId?: string
    rootId?: string
    operationName: string
    displayName?: string
    startTime?: string
    duration?: number
    traceState?: string
    traceFlags?: TraceFlags
    kind?: SpanKind
    status?: StatusCode
    statusDescription?: string
    source?: { name: string; version?: string }
    isAllDataRequested?: boolean
    baggage?: Pairs<string | null>
    tags?: Pairs<unknown>
    events?: SpanEventFile[]
    customProperties?: Record<string, unknown>
    parent?: SpanFile
}

const TimestampSchema = z.string().datetime({ offset: true })

function pairsSchema<T extends z.ZodTypeAny>(value: T) {
    return z.union([z.array(z.tuple([z.string(), value])), z.record(value)])
}

const SpanEventSchema = z.object({
    name: z.string(),
    timestamp: TimestampSchema,
    tags: pairsSchema(z.unknown()).optional(),
})

export const SpanFileSchema: z.ZodType<SpanFile> = z.lazy(() =>
    z.object({
        id: z.string().optional(),
        traceId: z.string().optional(),
        spanId: z.string().optional(),
        parentId: z.string().optional(),
        parentSpanId: z.string().optional(),
        rootId: z.string().optional(),
        operationName: z.string(),
        displayName: z.string().optional(),
        startTime: TimestampSchema.optional(),
        duration: z.number().nonnegative().optional(),
        traceState: z.string().optional(),
        traceFlags: z.enum(TRACE_FLAGS).optional(),
        kind: z.enum(SPAN_KINDS).optional(),
        status: z.enum(STATUS_CODES).optional(),
        statusDescription: z.string().optional(),
        source: z.object({ name: z.string(), version: z.string().optional() }).optional(),
        isAllDataRequested: z.boolean().optional(),
        baggage: pairsSchema(z.string().nullable()).optional(),
        tags: pairsSchema(z.unknown()).optional(),
        events: z.array(SpanEventSchema).optional(),
        customProperties: z.record(z.unknown()).optional(),
        parent: SpanFileSchema.optional(),
    })
)

function toPairs<T>(pairs: Pairs<T> | undefined): KeyValue<T>[] {
    if (!pairs) return []
    if (Array.isArray(pairs)) return pairs.map(([key, value]) => [key, value] as const)
    return Object.entries(pairs)
}

function toSpanRecord(file: SpanFile): SpanRecord {
    return new SpanRecord({
        id: file.id,
        traceId: file.traceId,
        spanId: file.spanId,
        parentId: file.parentId,
        parentSpanId: file.parentSpanId,
        rootId: file.rootId,
        operationName: file.operationName,
        displayName: file.displayName,
        startTime: file.startTime ? new Date(file.startTime) : undefined,
        duration: file.duration,
        traceState: file.traceState,
        traceFlags: file.traceFlags,
        kind: file.kind,
        status: file.status,
        statusDescription: file.statusDescription,
        source: file.source,
        isAllDataRequested: file.isAllDataRequested,
        baggage: toPairs(file.baggage).map(([key, value]) => [key, value ?? undefined] as const),
        tags: toPairs(file.tags),
        events: (file.events ?? []).map((event) => ({
            name: event.name,
            timestamp: new Date(event.timestamp),
            tags: toPairs(event.tags),
        })),
        customProperties: file.customProperties,
        parent: file.parent ? toSpanRecord(file.parent) : undefined,
    })
}

export function parseSpanFile(raw: unknown): SpanRecord {
    const result = SpanFileSchema.safeParse(raw)
    if (!result.success) {
        const issues = result.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
        throw new SpanFileError('Invalid span file', issues)
    }
    return toSpanRecord(result.data)
}

export async function loadSpanFile(fs: FileSystem, filePath: string): Promise<SpanRecord> {
    let raw: unknown
    try {
        raw = await fs.readJSON<unknown>(filePath)
    } catch (error) {
        throw new SpanFileError(`Cannot read span file ${filePath}`, [], { cause: error })
    }
    return parseSpanFile(raw)
}
