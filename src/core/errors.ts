export type ErrorKind = 'format' | 'config' | 'input'

export class SpanLayoutError extends Error {
    readonly kind: ErrorKind

    constructor(message: string, kind: ErrorKind, options?: ErrorOptions) {
        super(message, options)
        this.name = 'SpanLayoutError'
        this.kind = kind
    }
}

/** Thrown when a numeric, timespan or enum format string is not supported. */
export class LayoutFormatError extends SpanLayoutError {
    readonly format: string

    constructor(format: string, target: string, options?: ErrorOptions) {
        super(`Unsupported ${target} format "${format}"`, 'format', options)
        this.name = 'LayoutFormatError'
        this.format = format
    }
}

export class ConfigError extends SpanLayoutError {
    constructor(message: string, options?: ErrorOptions) {
        super(message, 'config', options)
        this.name = 'ConfigError'
    }
}

export class SpanFileError extends SpanLayoutError {
    readonly issues: string[]

    constructor(message: string, issues: string[] = [], options?: ErrorOptions) {
        super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message, 'input', options)
        this.name = 'SpanFileError'
        this.issues = issues
    }
}

export function errorMessage(error: unknown): string {
    if (error instanceof Error) return error.message
    return String(error)
}

export function errorKind(error: unknown): ErrorKind | undefined {
    if (error instanceof SpanLayoutError) return error.kind
    return undefined
}
