import { buildOpeningPrompt } from '../assistant/prompts.js'
import type { Container } from '../core/container.js'
import { errorMessage } from '../core/errors.js'
import type { ArtifactKind } from '../generators/types.js'
import { deepDiveMode, linkMode } from '../session/mode.js'
import { describeMode } from '../session/session.js'
import type { LearningMode } from '../session/types.js'
import { askCategory } from './prompts.js'
import { colors, formatError } from './ui.js'

/** What a slash-command handler may drive in the running REPL. */
export interface ReplContext {
    readonly container: Container
    /** Sends `prompt` in the current session. Resolves false when the exchange failed. */
    converse(prompt: string): Promise<boolean>
    generate(kind: ArtifactKind): Promise<void>
    /** Offers the last unsaved artifact again. */
    savePending(): Promise<boolean>
    exit(): void
}

export interface SlashCommand {
    name: string
    aliases?: string[]
    usage?: string
    description: string
    /** Returns the text to print; an empty string prints nothing. */
    handler: (ctx: ReplContext, args: string) => Promise<string>
}

async function startLearning(ctx: ReplContext, mode: LearningMode): Promise<string> {
    const { terminal, session } = ctx.container
    const category = await askCategory(terminal)
    session.start(mode, category)
    terminal.print(colors.bold(describeMode(mode)) + (category ? colors.dim(` [${category}]`) : ''))
    await ctx.converse(buildOpeningPrompt(mode))
    return ''
}

const commands: SlashCommand[] = [
    {
        name: '/learn',
        aliases: ['/deep'],
        usage: '/learn <topic>',
        description: 'Deep dive into a topic',
        handler: async (ctx, args) => {
            if (!args) return 'Usage: /learn <topic>'
            return startLearning(ctx, deepDiveMode(args))
        },
    },
    {
        name: '/link',
        usage: '/link <url>',
        description: 'Learn from an article or resource',
        handler: async (ctx, args) => {
            if (!args) return 'Usage: /link <url>'
            return startLearning(ctx, linkMode(args))
        },
    },
    {
        name: '/til',
        description: 'Generate a TIL from this session',
        handler: async (ctx) => {
            await ctx.generate('til')
            return ''
        },
    },
    {
        name: '/note',
        description: 'Generate a detailed note from this session',
        handler: async (ctx) => {
            await ctx.generate('note')
            return ''
        },
    },
    {
        name: '/save',
        description: 'Retry saving the last unsaved TIL or note',
        handler: async (ctx) => {
            const offered = await ctx.savePending()
            return offered ? '' : 'Nothing to save. Generate something with /til or /note first.'
        },
    },
    {
        name: '/category',
        usage: '/category [name]',
        description: 'Set the session category (asks when no name is given)',
        handler: async (ctx, args) => {
            const { session, terminal } = ctx.container
            const next = args ? args.toLowerCase() : await askCategory(terminal)
            session.category = next
            return next ? `Category set to ${colors.bold(next)}` : 'Category cleared.'
        },
    },
    {
        name: '/status',
        description: 'Show the current session',
        handler: async (ctx) => {
            const { session, config } = ctx.container
            const exchanges = Math.floor(session.transcript.size / 2)
            const lines = [
                `Session:   ${describeMode(session.mode)}`,
                `Category:  ${session.category ?? colors.dim('none')}`,
                `Exchanges: ${exchanges}`,
                `TIL path:  ${config.tilPath}`,
                `Notes:     ${config.notesPath ? `${config.notesPath} (${config.notesFormat})` : colors.dim('not configured')}`,
            ]
            return lines.join('\n')
        },
    },
    {
        name: '/clear',
        description: 'Forget the conversation, keep topic and category',
        handler: async (ctx) => {
            ctx.container.session.clear()
            return 'Conversation cleared.'
        },
    },
    {
        name: '/help',
        description: 'Show available commands',
        handler: async () => {
            const lines = commands.map((c) => {
                const names = [c.usage ?? c.name, ...(c.aliases ?? [])].join(', ')
                return `  ${colors.command(names.padEnd(22))} ${c.description}`
            })
            return `Commands:\n${lines.join('\n')}\n\nAnything else is sent to the assistant as a question.`
        },
    },
    {
        name: '/exit',
        aliases: ['/quit'],
        description: 'Leave Holocron',
        handler: async (ctx) => {
            ctx.exit()
            return ''
        },
    },
]

function resolveCommand(name: string): SlashCommand | undefined {
    const lower = name.toLowerCase()
    return commands.find((c) => c.name === lower || c.aliases?.includes(lower))
}

export function getSlashCommands(): readonly SlashCommand[] {
    return commands
}

/** Every name a slash command answers to, for completion. */
export function slashCommandNames(): string[] {
    return commands.flatMap((c) => [c.name, ...(c.aliases ?? [])])
}

export function parseSlashCommand(input: string): { name: string; args: string } {
    const trimmed = input.trim()
    const space = trimmed.search(/\s/)
    if (space === -1) return { name: trimmed.toLowerCase(), args: '' }
    return { name: trimmed.slice(0, space).toLowerCase(), args: trimmed.slice(space + 1).trim() }
}

/**
 * Runs the command named by `input`. Returns null when no such command
 * exists. Handler errors are turned into the text to print.
 */
export async function handleSlashCommand(input: string, ctx: ReplContext): Promise<string | null> {
    const { name, args } = parseSlashCommand(input)
    const command = resolveCommand(name)
    if (!command) return null

    try {
        return await command.handler(ctx, args)
    } catch (error) {
        ctx.container.logger.debug({ command: command.name, error: errorMessage(error) }, 'slash:failed')
        return formatError(errorMessage(error))
    }
}
