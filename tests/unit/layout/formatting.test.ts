import { describe, expect, it } from 'vitest'
import { ConfigError, LayoutFormatError } from '../../../src/core/errors.js'
import { Culture } from '../../../src/layout/culture.js'
import { formatDate, formatNumber, formatTimeSpan } from '../../../src/layout/formatting.js'

const invariant = Culture.invariant
const DATE = new Date(Date.UTC(2024, 0, 15, 10, 30, 45))

describe('Culture', () => {
    it('treats missing and "invariant" tags as the invariant culture', () => {
        expect(Culture.get(undefined)).toBe(invariant)
        expect(Culture.get('')).toBe(invariant)
        expect(Culture.get('Invariant')).toBe(invariant)
        expect(invariant.isInvariant).toBe(true)
    })

    it('caches cultures by tag', () => {
        const german = Culture.get('de-DE')
        expect(Culture.get('de-DE')).toBe(german)
        expect(german.isInvariant).toBe(false)
        expect(german.dateLocale.code).toBe('de')
        expect(german.decimalSeparator).toBe(',')
    })

    it('rejects malformed tags', () => {
        expect(() => Culture.get('not a locale!!')).toThrow(ConfigError)
    })
})

describe('formatNumber', () => {
    it('uses round-trip text for the invariant culture', () => {
        expect(formatNumber(1500.25, undefined, invariant)).toBe('1500.25')
        expect(formatNumber(1500.25, 'R', invariant)).toBe('1500.25')
    })

    it('supports fixed, grouped and significant-digit formats', () => {
        expect(formatNumber(3.14159, 'F2', invariant)).toBe('3.14')
        expect(formatNumber(1234567, 'N0', invariant)).toBe('1,234,567')
        expect(formatNumber(1234.5, 'N2', Culture.get('de-DE'))).toBe('1.234,50')
        expect(formatNumber(1234.5, 'G3', invariant)).toBe('1230')
    })

    it('rejects unknown formats', () => {
        expect(() => formatNumber(1, 'X', invariant)).toThrow(LayoutFormatError)
        expect(() => formatNumber(1, '0.00', invariant)).toThrow('Unsupported number format "0.00"')
    })
})

describe('formatDate', () => {
    it('renders in UTC with the invariant pattern', () => {
        expect(formatDate(DATE, undefined, invariant)).toBe('01/15/2024 10:30:45')
    })

    it('uses date-fns patterns', () => {
        expect(formatDate(DATE, 'yyyy-MM-dd HH:mm', invariant)).toBe('2024-01-15 10:30')
    })

    it('uses the culture short date and medium time', () => {
        expect(formatDate(DATE, undefined, Culture.get('de-DE'))).toBe('15.01.2024 10:30:45')
        expect(formatDate(DATE, undefined, Culture.get('en-US'))).toBe('01/15/2024 10:30:45 AM')
    })

    it('maps one-letter standard formats in the invariant culture', () => {
        expect(formatDate(DATE, 'd', invariant)).toBe('01/15/2024')
        expect(formatDate(DATE, 'D', invariant)).toBe('Monday, 15 January 2024')
        expect(formatDate(DATE, 'f', invariant)).toBe('Monday, 15 January 2024 10:30')
        expect(formatDate(DATE, 'g', invariant)).toBe('01/15/2024 10:30')
        expect(formatDate(DATE, 'G', invariant)).toBe('01/15/2024 10:30:45')
        expect(formatDate(DATE, 't', invariant)).toBe('10:30')
        expect(formatDate(DATE, 'T', invariant)).toBe('10:30:45')
    })

    it('renders round-trip and sortable formats the same in every culture', () => {
        const german = Culture.get('de-DE')
        expect(formatDate(DATE, 'o', invariant)).toBe('2024-01-15T10:30:45.0000000Z')
        expect(formatDate(DATE, 'O', german)).toBe('2024-01-15T10:30:45.0000000Z')
        expect(formatDate(DATE, 's', german)).toBe('2024-01-15T10:30:45')
        expect(formatDate(DATE, 'u', invariant)).toBe('2024-01-15 10:30:45Z')
        expect(formatDate(DATE, 'r', german)).toBe('Mon, 15 Jan 2024 10:30:45 GMT')
    })

    it('maps one-letter standard formats to the culture patterns', () => {
        const english = Culture.get('en-US')
        expect(formatDate(DATE, 'd', english)).toBe('01/15/2024')
        expect(formatDate(DATE, 't', english)).toBe('10:30 AM')
        expect(formatDate(DATE, 'd', Culture.get('de-DE'))).toBe('15.01.2024')
    })

    it('rejects unknown one-letter formats', () => {
        expect(() => formatDate(DATE, 'x', invariant)).toThrow(LayoutFormatError)
        expect(() => formatDate(DATE, 'q', invariant)).toThrow('Unsupported date format "q"')
    })
})

describe('formatTimeSpan', () => {
    const dayAndChange = 90061001 // 1d 1h 1m 1s 1ms

    it('uses the constant format by default', () => {
        expect(formatTimeSpan(1500.25, undefined, invariant)).toBe('00:00:01.5002500')
        expect(formatTimeSpan(0, 'c', invariant)).toBe('00:00:00')
        expect(formatTimeSpan(dayAndChange, undefined, invariant)).toBe('1.01:01:01.0010000')
        expect(formatTimeSpan(-1000, undefined, invariant)).toBe('-00:00:01')
    })

    it('supports the short and long general formats', () => {
        expect(formatTimeSpan(dayAndChange, 'g', invariant)).toBe('1:1:01:01.001')
        expect(formatTimeSpan(dayAndChange, 'G', invariant)).toBe('1:01:01:01.0010000')
        expect(formatTimeSpan(1500.25, 'g', Culture.get('de-DE'))).toBe('0:00:01,50025')
    })

    it('rejects custom formats', () => {
        expect(() => formatTimeSpan(1, 'hh\\:mm', invariant)).toThrow(LayoutFormatError)
    })
})
