import { Command, CommanderError } from 'commander'
import { DEFAULT_ARCHIVE_DIR } from '../config/defaults.js'
import { type Runtime, createContainer, createRuntime } from '../core/container.js'
import { errorMessage, exitCodeFor } from '../core/errors.js'
import { deepDiveMode, linkMode } from '../session/mode.js'
import { configCommand } from './commands/config-cmd.js'
import { initCommand } from './commands/init-cmd.js'
import { learnCommand } from './commands/learn-cmd.js'
import { startREPL } from './repl.js'
import { ensureConfig } from './setup.js'
import { VERSION, colors, formatError } from './ui.js'

type GlobalOptions = {
    debug?: boolean
}

type LearnFlags = {
    category?: string
    followUp?: boolean
}

/**
 * Builds the command tree. A runtime passed in is used as is; otherwise one
 * is created lazily so `--debug` can decide the log level.
 */
export function createProgram(runtime?: Runtime): Command {
    const program = new Command()
    let created: Runtime | undefined = runtime
    const getRuntime = (): Runtime => {
        created ??= createRuntime({ debug: program.opts<GlobalOptions>().debug })
        return created
    }

    program
        .name('holocron')
        .description('Interactive learning assistant that turns conversations into TILs and notes')
        .version(VERSION)
        .exitOverride()
        .option('--debug', 'Enable debug logging')
        .action(async () => {
            const rt = getRuntime()
            const config = await ensureConfig(rt)
            if (!config) {
                rt.terminal.print(colors.warn('Setup cancelled. Run holocron again when you are ready.'))
                return
            }
            await startREPL(createContainer(config, rt))
        })

    program
        .command('learn')
        .description('Deep dive into a topic')
        .argument('<topic...>', 'Topic to learn about')
        .option('-c, --category <name>', 'Category for the TIL')
        .option('--follow-up', 'Keep the conversation going in the REPL')
        .action(async (topic: string[], flags: LearnFlags) => {
            const mode = deepDiveMode(topic.join(' '))
            await learnCommand(getRuntime(), mode, flags)
        })

    program
        .command('link')
        .description('Learn from an article or resource')
        .argument('<url>', 'Address of the resource')
        .option('-c, --category <name>', 'Category for the TIL')
        .option('--follow-up', 'Keep the conversation going in the REPL')
        .action(async (url: string, flags: LearnFlags) => {
            const mode = linkMode(url)
            await learnCommand(getRuntime(), mode, flags)
        })

    program
        .command('init')
        .description('Create a TIL repository skeleton')
        .argument('<path>', 'Directory to initialise')
        .option('--archive-dir <dir>', 'Directory TILs are archived under', DEFAULT_ARCHIVE_DIR)
        .option('--force', 'Initialise even when the directory is not empty')
        .action(async (target: string, flags: { archiveDir: string; force?: boolean }) => {
            await initCommand(getRuntime(), target, { archiveDir: flags.archiveDir, force: flags.force })
        })

    program
        .command('config')
        .description('Show or update the configuration')
        .option('--til-path <path>', 'TIL repository')
        .option('--notes-path <path>', 'Directory for detailed notes')
        .option('--notes-format <format>', 'obsidian, logseq or plain')
        .option('--archive-dir <dir>', 'Directory TILs are archived under')
        .action(async (flags: { tilPath?: string; notesPath?: string; notesFormat?: string; archiveDir?: string }) => {
            await configCommand(getRuntime(), flags)
        })

    return program
}

/** Parses `argv` and runs the matching command. Resolves to the exit code. */
export async function runCli(argv: string[], runtime?: Runtime): Promise<number> {
    const program = createProgram(runtime)
    try {
        await program.parseAsync(argv)
        return 0
    } catch (error) {
        if (error instanceof CommanderError) return error.exitCode
        console.error(formatError(errorMessage(error)))
        return exitCodeFor(error)
    }
}
