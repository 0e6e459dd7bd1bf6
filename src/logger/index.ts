import pino from 'pino'
import type { ResolvedConfig } from '../config/schema.js'

export type Logger = pino.Logger

export interface CreateLoggerOptions {
    mixin?: () => object
    destination?: pino.DestinationStream
}

export function createLogger(config: Pick<ResolvedConfig, 'logLevel'>, options: CreateLoggerOptions = {}): Logger {
    const pretty = config.logLevel === 'debug' || config.logLevel === 'trace'
    const loggerOptions: pino.LoggerOptions = {
        name: 'span-layout',
        level: config.logLevel,
        mixin: options.mixin,
        transport: pretty && !options.destination
            ? { target: 'pino-pretty', options: { colorize: true } }
            : undefined,
    }
    return options.destination ? pino(loggerOptions, options.destination) : pino(loggerOptions)
}

/** Logger for commands whose stdout carries their result. */
export function createDiagnosticsLogger(config: Pick<ResolvedConfig, 'logLevel'>): Logger {
    return createLogger(config, { destination: process.stderr })
}
