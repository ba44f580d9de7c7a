import type { Container } from '../core/container.js'
import { errorMessage, isAbortError } from '../core/errors.js'
import { generateNote } from '../generators/note.js'
import { generateTil } from '../generators/til.js'
import type { ArtifactKind, GeneratedArtifact } from '../generators/types.js'
import { saveArtifact } from '../persistence/writer.js'
import { runExchange, withStreamingOutput } from './exchange.js'
import { askSaveDecision } from './prompts.js'
import { type ReplContext, handleSlashCommand, parseSlashCommand } from './slash-commands.js'
import { colors, formatError, formatSaved, rule } from './ui.js'

export type ReplState = 'idle' | 'awaiting_assistant' | 'awaiting_save_confirmation' | 'exiting'

const generators = { til: generateTil, note: generateNote } as const

/**
 * Routes REPL input to slash commands or the assistant and owns the REPL
 * state machine. Only one assistant call is in flight at a time.
 */
export class Dispatcher implements ReplContext {
    private current: ReplState = 'idle'
    private inFlight: AbortController | null = null
    /** Last generated artifact that was not saved, offered again by /save. */
    pendingArtifact: GeneratedArtifact | null = null

    constructor(readonly container: Container) {}

    get state(): ReplState {
        return this.current
    }

    async dispatch(line: string): Promise<ReplState> {
        const text = line.trim()
        if (!text || this.current === 'exiting') return this.current

        if (text.startsWith('/')) {
            const output = await handleSlashCommand(text, this)
            if (output === null) {
                const { name } = parseSlashCommand(text)
                this.container.terminal.print(`Unknown command: ${name}. Type /help for the list.`)
            } else if (output) {
                this.container.terminal.print(output)
            }
            return this.current
        }

        await this.converse(text)
        return this.current
    }

    async converse(prompt: string): Promise<boolean> {
        return this.withAssistant(async (signal) => {
            await runExchange(this.container, prompt, signal)
            return true
        }, false)
    }

    async generate(kind: ArtifactKind): Promise<void> {
        const { session, config, assistant, terminal } = this.container
        if (session.isEmpty) {
            terminal.print(colors.warn('Nothing has been discussed yet, so this starts from a skeleton.'))
        }

        const artifact = await this.withAssistant<GeneratedArtifact | null>(async (signal) => {
            const label = kind === 'til' ? 'Generating TIL...' : 'Generating note...'
            const { value } = await withStreamingOutput(terminal, { spinnerLabel: label }, () =>
                generators[kind]({ session, config, assistant, signal })
            )
            return value
        }, null)
        if (!artifact) return

        terminal.print(rule('─'))
        terminal.print(artifact.body.trimEnd())
        terminal.print(rule('─'))

        this.pendingArtifact = artifact
        await this.confirmAndSave(artifact)
    }

    async savePending(): Promise<boolean> {
        if (!this.pendingArtifact) return false
        await this.confirmAndSave(this.pendingArtifact)
        return true
    }

    /**
     * Aborts the assistant call in flight. Returns false when there was none,
     * which the REPL takes as a request to leave.
     */
    interrupt(): boolean {
        if (!this.inFlight) return false
        this.inFlight.abort()
        return true
    }

    exit(): void {
        this.current = 'exiting'
    }

    private async confirmAndSave(artifact: GeneratedArtifact): Promise<void> {
        const { terminal, fs, config, logger } = this.container
        this.current = 'awaiting_save_confirmation'
        try {
            const decision = await askSaveDecision(terminal, artifact)
            if (decision.action === 'discard') {
                this.pendingArtifact = null
                terminal.print(colors.dim('Discarded.'))
                return
            }

            const result = await saveArtifact(fs, artifact, config, logger, decision.path)
            if (!result.ok) {
                terminal.print(formatError(result.error.message))
                terminal.print(colors.dim('Use /save to try again.'))
                return
            }

            this.pendingArtifact = null
            terminal.print(formatSaved(artifact.kind, result.value.path))
            if (result.value.indexWarning) terminal.print(colors.warn(result.value.indexWarning))
        } finally {
            if (this.current === 'awaiting_save_confirmation') this.current = 'idle'
        }
    }

    private async withAssistant<T>(task: (signal: AbortSignal) => Promise<T>, onFailure: T): Promise<T> {
        const controller = new AbortController()
        this.inFlight = controller
        this.current = 'awaiting_assistant'
        try {
            return await task(controller.signal)
        } catch (error) {
            this.report(error)
            return onFailure
        } finally {
            this.inFlight = null
            if (this.current === 'awaiting_assistant') this.current = 'idle'
        }
    }

    private report(error: unknown): void {
        const { terminal, logger } = this.container
        if (isAbortError(error)) {
            logger.debug('assistant:interrupted')
            terminal.print(colors.warn('Interrupted.'))
            return
        }
        logger.debug({ error: errorMessage(error) }, 'dispatch:failed')
        terminal.print(formatError(errorMessage(error)))
    }
}
