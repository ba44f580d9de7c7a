import { buildOpeningPrompt } from '../../assistant/prompts.js'
import { type Runtime, createContainer } from '../../core/container.js'
import { describeMode } from '../../session/session.js'
import type { LearningMode } from '../../session/types.js'
import { runExchange } from '../exchange.js'
import { startREPL } from '../repl.js'
import { ensureConfig } from '../setup.js'
import { colors } from '../ui.js'

export interface LearnOptions {
    category?: string
    followUp?: boolean
}

/**
 * One-shot `learn` and `link`: sends the opening prompt and prints the answer.
 * With `followUp` the session continues in the REPL.
 */
export async function learnCommand(runtime: Runtime, mode: LearningMode, options: LearnOptions = {}): Promise<void> {
    const config = await ensureConfig(runtime)
    if (!config) {
        runtime.terminal.print(colors.warn('Setup cancelled.'))
        return
    }

    const container = createContainer(config, runtime)
    const category = options.category?.trim().toLowerCase() || null
    container.session.start(mode, category)
    container.terminal.print(colors.bold(describeMode(mode)) + (category ? colors.dim(` [${category}]`) : ''))

    const controller = new AbortController()
    const onSigint = () => controller.abort()
    process.once('SIGINT', onSigint)
    try {
        await runExchange(container, buildOpeningPrompt(mode), controller.signal)
    } finally {
        process.removeListener('SIGINT', onSigint)
    }

    if (options.followUp) await startREPL(container)
}
