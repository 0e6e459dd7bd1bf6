import { LayoutFormatError } from '../core/errors.js'
import {
    SPAN_KINDS,
    STATUS_CODES,
    TRACE_FLAGS,
    type SpanKind,
    type StatusCode,
    type TraceFlags,
} from '../tracing/types.js'

/** Members in declaration order; the first one is the unset/default member. */
export interface EnumTable<T extends string> {
    readonly name: string
    readonly members: readonly T[]
    readonly defaultMember: T
}

export function defineEnum<T extends string>(name: string, members: readonly [T, ...T[]]): EnumTable<T> {
    return { name, members, defaultMember: members[0] }
}

export const TRACE_FLAGS_ENUM = defineEnum<TraceFlags>('trace flags', TRACE_FLAGS)
export const SPAN_KIND_ENUM = defineEnum<SpanKind>('span kind', SPAN_KINDS)
export const STATUS_CODE_ENUM = defineEnum<StatusCode>('status code', STATUS_CODES)

export function isIntegerFormat(format: string | undefined): boolean {
    return format === 'd' || format === 'D'
}

function formatGeneric<T extends string>(table: EnumTable<T>, value: T, ordinal: number, format: string): string {
    switch (format) {
        case 'G':
        case 'g':
        case 'F':
        case 'f':
            return value
        case 'X':
            return ordinal.toString(16).toUpperCase().padStart(8, '0')
        case 'x':
            return ordinal.toString(16).padStart(8, '0')
        default:
            throw new LayoutFormatError(format, table.name)
    }
}

/**
 * Without a format the default member is uninformative and renders empty.
 * `d` renders the ordinal; `G`/`F` the name; `X` eight hex digits.
 *
 * @throws LayoutFormatError for any other format
 */
export function formatEnumValue<T extends string>(table: EnumTable<T>, value: T, format?: string): string {
    if (!format) {
        return value === table.defaultMember ? '' : value
    }

    const ordinal = table.members.indexOf(value)
    if (isIntegerFormat(format)) {
        return String(ordinal)
    }

    return formatGeneric(table, value, ordinal, format)
}
