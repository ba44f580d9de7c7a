import type { AssistantSettings } from '../config/schema.js'
import { AssistantError } from '../core/errors.js'
import type { Logger } from '../logger/index.js'
import type { Turn } from '../session/types.js'
import { type ProcessOutcome, type ProcessRunner, runProcess } from './process-runner.js'
import { parseStreamLine } from './stream-parser.js'
import type { AskOptions, AssistantClient, AssistantReply } from './types.js'

const AUTH_PATTERN = /not logged in|please run \/login|invalid api key|authenticat|unauthori[sz]ed/i

export function renderContext(context: readonly Turn[]): string {
    const lines = context.map((t) => `${t.role === 'user' ? 'User' : 'Assistant'}: ${t.text}`)
    return `Conversation so far:\n\n${lines.join('\n\n')}\n\n---\n\n`
}

export function classifyOutcome(
    outcome: ProcessOutcome,
    settings: AssistantSettings,
    errorResult: string | null
): AssistantError | null {
    switch (outcome.kind) {
        case 'not_found':
            return new AssistantError({ reason: 'not_installed', command: settings.command })
        case 'timed_out':
            return new AssistantError({ reason: 'timeout', timeoutMs: settings.timeoutMs })
        case 'canceled':
            return new AssistantError({ reason: 'aborted' })
        case 'exited': {
            const detail = (errorResult || outcome.stderr).trim()
            if (outcome.exitCode === 0 && errorResult === null) return null
            if (AUTH_PATTERN.test(detail)) return new AssistantError({ reason: 'not_authenticated', detail })
            const exitCode = outcome.exitCode === 0 ? 1 : outcome.exitCode
            return new AssistantError({ reason: 'non_zero_exit', exitCode, detail: detail.split('\n')[0] })
        }
    }
}

/**
 * Talks to the assistant CLI in print mode, streaming its `stream-json`
 * output back through `onText`.
 */
export class ClaudeCliClient implements AssistantClient {
    constructor(
        private settings: AssistantSettings,
        private logger: Logger,
        private run: ProcessRunner = runProcess
    ) {}

    buildArgs(prompt: string, options: AskOptions = {}): string[] {
        const args = ['--print', '--output-format', 'stream-json', '--verbose']
        let message = prompt
        if (options.resumeId) {
            args.push('--resume', options.resumeId)
        } else if (options.context && options.context.length > 0) {
            message = renderContext(options.context) + prompt
        }
        args.push(message)
        return args
    }

    async ask(prompt: string, options: AskOptions = {}): Promise<AssistantReply> {
        if (options.signal?.aborted) throw new AssistantError({ reason: 'aborted' })

        const args = this.buildArgs(prompt, options)
        let text = ''
        let sessionId: string | undefined
        let errorResult: string | null = null

        const started = Date.now()
        this.logger.debug({ command: this.settings.command, resume: options.resumeId ?? null }, 'assistant:start')

        const outcome = await this.run(this.settings.command, args, {
            timeoutMs: this.settings.timeoutMs,
            signal: options.signal,
            onLine: (line) => {
                for (const event of parseStreamLine(line)) {
                    if (event.kind === 'text') {
                        text += event.text
                        options.onText?.(event.text)
                    } else {
                        sessionId = event.sessionId
                        if (event.isError) errorResult = event.result || 'assistant reported an error'
                    }
                }
            },
        })

        this.logger.debug({ outcome: outcome.kind, duration: Date.now() - started }, 'assistant:exit')

        const failure = classifyOutcome(outcome, this.settings, errorResult)
        if (failure) {
            this.logger.warn({ failure: failure.failure }, 'assistant:failed')
            throw failure
        }

        return sessionId ? { text, sessionId } : { text }
    }
}
