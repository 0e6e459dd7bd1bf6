import { Command } from 'commander'
import { loadConfig } from '../config/loader.js'
import { errorMessage } from '../core/errors.js'
import { NodeFileSystem } from '../core/fs.js'
import { createDiagnosticsLogger } from '../logger/index.js'
import { fieldsCommand } from './commands/fields-cmd.js'
import { propertiesCommand } from './commands/properties-cmd.js'
import { type RenderFlags, renderCommand } from './commands/render-cmd.js'
import { formatError } from './ui.js'

function fail(error: unknown): never {
    console.error(formatError(errorMessage(error)))
    process.exit(1)
}

export function createProgram(): Command {
    const program = new Command()

    program
        .name('span-layout')
        .description('Preview span layouts against span snapshots')
        .version('0.1.0')

    program
        .command('render <span-file>')
        .description('Render one span property')
        .option('-p, --property <name>', 'Span property', 'TraceId')
        .option('-i, --item <key>', 'Baggage, tag or custom property key')
        .option('-f, --format <format>', 'Format string ("@" for JSON-like collections, "d" for enum integers)')
        .option('-c, --culture <tag>', 'Culture for numbers and dates')
        .option('--parent', 'Read from the parent span')
        .option('--root', 'Read from the root span')
        .action(async (spanFile: string, flags: RenderFlags) => {
            try {
                console.log(await renderCommand(new NodeFileSystem(), spanFile, flags))
            } catch (error) {
                fail(error)
            }
        })

    program
        .command('fields <span-file>')
        .description('Render every configured field as JSON')
        .option('--config <path>', 'Config file (defaults to span-layout.config.json)')
        .option('--debug', 'Enable debug logging')
        .action(async (spanFile: string, flags: { config?: string; debug?: boolean }) => {
            try {
                const fs = new NodeFileSystem()
                const bootstrap = createDiagnosticsLogger({ logLevel: flags.debug ? 'debug' : 'warn' })
                const config = await loadConfig({
                    fs,
                    configFile: flags.config,
                    cliFlags: { logLevel: flags.debug ? 'debug' : undefined },
                    logger: bootstrap,
                })
                console.log(await fieldsCommand(fs, spanFile, config, createDiagnosticsLogger(config)))
            } catch (error) {
                fail(error)
            }
        })

    program
        .command('properties')
        .description('List renderable span properties')
        .action(() => {
            console.log(propertiesCommand())
        })

    return program
}
