import { UTCDate } from '@date-fns/utc'
import { format as formatPattern } from 'date-fns'
import { LayoutFormatError } from '../core/errors.js'
import { Culture } from './culture.js'

export const INVARIANT_DATE_PATTERN = 'MM/dd/yyyy HH:mm:ss'
export const CULTURE_DATE_PATTERN = 'P pp'

const STANDARD_NUMBER_FORMAT = /^([FfNnGgRr])(\d{0,2})$/

const numberFormatters = new Map<string, Intl.NumberFormat>()

function numberFormatter(locale: string, options: Intl.NumberFormatOptions): Intl.NumberFormat {
    const key = `${locale}|${JSON.stringify(options)}`
    let formatter = numberFormatters.get(key)
    if (!formatter) {
        formatter = new Intl.NumberFormat(locale, options)
        numberFormatters.set(key, formatter)
    }
    return formatter
}

function formatGeneral(value: number, culture: Culture): string {
    if (culture.isInvariant) return String(value)
    return numberFormatter(culture.numberLocale, { useGrouping: false, maximumFractionDigits: 15 }).format(value)
}

/**
 * Standard numeric formats: `F<n>` fixed-point, `N<n>` grouped, `G<n>` significant
 * digits, `R` round-trip. An empty format renders like `R`.
 */
export function formatNumber(value: number, format: string | undefined, culture: Culture): string {
    if (!format) return formatGeneral(value, culture)

    const match = STANDARD_NUMBER_FORMAT.exec(format)
    if (!match) throw new LayoutFormatError(format, 'number')

    const specifier = (match[1] ?? '').toUpperCase()
    const digits = match[2] ? Number(match[2]) : undefined

    switch (specifier) {
        case 'F':
            return numberFormatter(culture.numberLocale, {
                useGrouping: false,
                minimumFractionDigits: digits ?? 2,
                maximumFractionDigits: digits ?? 2,
            }).format(value)
        case 'N':
            return numberFormatter(culture.numberLocale, {
                useGrouping: true,
                minimumFractionDigits: digits ?? 2,
                maximumFractionDigits: digits ?? 2,
            }).format(value)
        case 'G':
            if (!digits) return formatGeneral(value, culture)
            return numberFormatter(culture.numberLocale, {
                useGrouping: false,
                maximumSignificantDigits: Math.min(digits, 21),
            }).format(value)
        default:
            return formatGeneral(value, culture)
    }
}

export function isValidDate(date: Date | undefined): date is Date {
    return date !== undefined && !Number.isNaN(date.getTime())
}

// One-letter standard date formats, as date-fns patterns
const INVARIANT_DATE_FORMATS: Readonly<Record<string, string>> = {
    d: 'MM/dd/yyyy',
    D: 'EEEE, dd MMMM yyyy',
    f: 'EEEE, dd MMMM yyyy HH:mm',
    F: 'EEEE, dd MMMM yyyy HH:mm:ss',
    g: 'MM/dd/yyyy HH:mm',
    G: INVARIANT_DATE_PATTERN,
    t: 'HH:mm',
    T: 'HH:mm:ss',
    m: 'MMMM dd',
    M: 'MMMM dd',
    y: 'yyyy MMMM',
    Y: 'yyyy MMMM',
    U: 'EEEE, dd MMMM yyyy HH:mm:ss',
}

const CULTURE_DATE_FORMATS: Readonly<Record<string, string>> = {
    d: 'P',
    D: 'PPPP',
    f: 'PPPP p',
    F: 'PPPP pp',
    g: 'P p',
    G: CULTURE_DATE_PATTERN,
    t: 'p',
    T: 'pp',
    m: 'MMMM d',
    M: 'MMMM d',
    y: 'MMMM yyyy',
    Y: 'MMMM yyyy',
    U: 'PPPP pp',
}

// Same text in every culture
const FIXED_DATE_FORMATS: Readonly<Record<string, string>> = {
    o: "yyyy-MM-dd'T'HH:mm:ss.SSS'0000Z'",
    O: "yyyy-MM-dd'T'HH:mm:ss.SSS'0000Z'",
    r: "EEE, dd MMM yyyy HH:mm:ss 'GMT'",
    R: "EEE, dd MMM yyyy HH:mm:ss 'GMT'",
    s: "yyyy-MM-dd'T'HH:mm:ss",
    u: "yyyy-MM-dd HH:mm:ss'Z'",
}

function datePattern(format: string, culture: Culture): string {
    if (format.length !== 1) return format

    const pattern = FIXED_DATE_FORMATS[format]
        ?? (culture.isInvariant ? INVARIANT_DATE_FORMATS : CULTURE_DATE_FORMATS)[format]
    if (pattern === undefined) throw new LayoutFormatError(format, 'date')
    return pattern
}

/**
 * Renders `date` in UTC. One-letter formats are the standard date formats
 * (`d`, `D`, `f`, `F`, `g`, `G`, `m`, `o`, `r`, `s`, `t`, `T`, `u`, `U`, `y`);
 * longer formats are date-fns patterns. Without a format this is `G`.
 */
export function formatDate(date: Date, format: string | undefined, culture: Culture): string {
    const utc = new UTCDate(date.getTime())
    const standard = format || 'G'
    const locale = FIXED_DATE_FORMATS[standard] === undefined ? culture.dateLocale : Culture.invariant.dateLocale
    return formatPattern(utc, datePattern(standard, culture), { locale })
}

export const TICKS_PER_MILLISECOND = 10_000
const TICKS_PER_SECOND = TICKS_PER_MILLISECOND * 1000
const TICKS_PER_MINUTE = TICKS_PER_SECOND * 60
const TICKS_PER_HOUR = TICKS_PER_MINUTE * 60
const TICKS_PER_DAY = TICKS_PER_HOUR * 24

function pad(value: number, width: number): string {
    return String(value).padStart(width, '0')
}

/**
 * Timespan text with 100ns ticks:
 * `c` (default) `[-][d.]hh:mm:ss[.fffffff]`,
 * `g` `[-][d:]h:mm:ss[.FFFFFFF]`,
 * `G` `[-]d:hh:mm:ss.fffffff`.
 */
export function formatTimeSpan(milliseconds: number, format: string | undefined, culture: Culture): string {
    const ticks = Math.round(milliseconds * TICKS_PER_MILLISECOND)
    const sign = ticks < 0 ? '-' : ''
    let rest = Math.abs(ticks)

    const days = Math.floor(rest / TICKS_PER_DAY)
    rest -= days * TICKS_PER_DAY
    const hours = Math.floor(rest / TICKS_PER_HOUR)
    rest -= hours * TICKS_PER_HOUR
    const minutes = Math.floor(rest / TICKS_PER_MINUTE)
    rest -= minutes * TICKS_PER_MINUTE
    const seconds = Math.floor(rest / TICKS_PER_SECOND)
    const fraction = rest - seconds * TICKS_PER_SECOND

    const pattern = format || 'c'
    switch (pattern) {
        case 'c':
        case 't':
        case 'T': {
            const dayPart = days > 0 ? `${days}.` : ''
            const fractionPart = fraction > 0 ? `.${pad(fraction, 7)}` : ''
            return `${sign}${dayPart}${pad(hours, 2)}:${pad(minutes, 2)}:${pad(seconds, 2)}${fractionPart}`
        }
        case 'g': {
            const dayPart = days > 0 ? `${days}:` : ''
            const fractionPart = fraction > 0 ? `${culture.decimalSeparator}${pad(fraction, 7).replace(/0+$/, '')}` : ''
            return `${sign}${dayPart}${hours}:${pad(minutes, 2)}:${pad(seconds, 2)}${fractionPart}`
        }
        case 'G':
            return `${sign}${days}:${pad(hours, 2)}:${pad(minutes, 2)}:${pad(seconds, 2)}${culture.decimalSeparator}${pad(fraction, 7)}`
        default:
            throw new LayoutFormatError(pattern, 'timespan')
    }
}
