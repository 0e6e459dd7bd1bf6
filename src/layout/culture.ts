import type { Locale } from 'date-fns'
import * as dateLocales from 'date-fns/locale'
import { enUS } from 'date-fns/locale'
import { ConfigError } from '../core/errors.js'

export const INVARIANT_CULTURE_NAME = 'invariant'

function isLocale(value: unknown): value is Locale {
    return typeof value === 'object' && value !== null && 'code' in value && typeof value.code === 'string'
}

let localesByCode: Map<string, Locale> | undefined

function findDateLocale(tag: string): Locale {
    if (!localesByCode) {
        localesByCode = new Map()
        const candidates: unknown[] = Object.values(dateLocales)
        for (const candidate of candidates) {
            if (isLocale(candidate) && candidate.code) localesByCode.set(candidate.code.toLowerCase(), candidate)
        }
    }
    const lower = tag.toLowerCase()
    const language = lower.split('-')[0] ?? lower
    return localesByCode.get(lower) ?? localesByCode.get(language) ?? enUS
}

/**
 * Locale used for numbers and dates. `Culture.invariant` is compared by
 * identity: the duration fast path only runs for that exact instance.
 */
export class Culture {
    static readonly invariant = new Culture(INVARIANT_CULTURE_NAME, 'en-US', enUS)

    private static readonly cultures = new Map<string, Culture>()

    private separator: string | undefined

    private constructor(
        readonly name: string,
        readonly numberLocale: string,
        readonly dateLocale: Locale
    ) {}

    static get(tag: string | undefined): Culture {
        if (!tag || tag.toLowerCase() === INVARIANT_CULTURE_NAME) return Culture.invariant

        const cached = Culture.cultures.get(tag)
        if (cached) return cached

        let canonical: string
        try {
            canonical = Intl.getCanonicalLocales(tag)[0] ?? tag
        } catch (error) {
            throw new ConfigError(`Unknown culture "${tag}"`, { cause: error })
        }

        const culture = new Culture(canonical, canonical, findDateLocale(canonical))
        Culture.cultures.set(tag, culture)
        return culture
    }

    get isInvariant(): boolean {
        return this === Culture.invariant
    }

    get decimalSeparator(): string {
        if (this.separator === undefined) {
            const parts = new Intl.NumberFormat(this.numberLocale).formatToParts(1.5)
            this.separator = parts.find((part) => part.type === 'decimal')?.value ?? '.'
        }
        return this.separator
    }
}
