import path from 'node:path'
import { errorMessage } from '../core/errors.js'
import type { FileSystem } from '../core/fs.js'
import type { Logger } from '../logger/index.js'
import { CONFIG_DIR, DEFAULT_CONFIG, GLOBAL_CONFIG_FILE, LOCAL_CONFIG_FILE } from './defaults.js'
import { type Config, ConfigSchema, LogLevelSchema, type ResolvedConfig } from './schema.js'

interface LoadConfigOptions {
    fs: FileSystem
    cliFlags?: Config
    projectDir?: string
    /** Explicit config file; replaces the project config file. */
    configFile?: string
    logger?: Logger
}

async function loadJsonConfig(fs: FileSystem, filePath: string, logger?: Logger): Promise<Config> {
    try {
        if (await fs.exists(filePath)) {
            const raw = await fs.readJSON<unknown>(filePath)
            return ConfigSchema.parse(raw)
        }
    } catch (error) {
        logger?.warn({ file: filePath, error: errorMessage(error) }, 'config:invalid')
    }
    return {}
}

function mergeConfigs(...configs: Config[]): Config {
    return configs.reduce<Config>(
        (merged, cfg) => ({
            logLevel: cfg.logLevel ?? merged.logLevel,
            culture: cfg.culture ?? merged.culture,
            fields: cfg.fields ? { ...merged.fields, ...cfg.fields } : merged.fields,
        }),
        {}
    )
}

function envConfig(): Config {
    const config: Config = {}
    const logLevel = LogLevelSchema.safeParse(process.env.SPAN_LAYOUT_LOG_LEVEL)
    if (logLevel.success) config.logLevel = logLevel.data
    if (process.env.SPAN_LAYOUT_CULTURE) config.culture = process.env.SPAN_LAYOUT_CULTURE
    return config
}

export async function loadConfig(options: LoadConfigOptions): Promise<ResolvedConfig> {
    const { fs, cliFlags = {}, projectDir = process.cwd(), logger } = options

    const globalConfig = await loadJsonConfig(fs, GLOBAL_CONFIG_FILE, logger)
    const localFile = options.configFile ?? path.join(projectDir, LOCAL_CONFIG_FILE)
    const localConfig = await loadJsonConfig(fs, localFile, logger)

    // Priority: CLI flags > env vars > local config > global config > defaults
    const merged = mergeConfigs(globalConfig, localConfig, envConfig(), cliFlags)

    return {
        logLevel: merged.logLevel ?? DEFAULT_CONFIG.logLevel,
        culture: merged.culture ?? DEFAULT_CONFIG.culture,
        fields: merged.fields ?? DEFAULT_CONFIG.fields,
        projectDir,
        configDir: CONFIG_DIR,
    }
}
