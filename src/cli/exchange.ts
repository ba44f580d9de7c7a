import type { Container } from '../core/container.js'
import type { Terminal } from './terminal.js'

export interface StreamingOptions {
    spinnerLabel: string
    /** Printed once, right before the first streamed chunk. */
    header?: string
}

/**
 * Runs `task` behind a spinner that gives way to the streamed text as soon as
 * the first chunk arrives.
 */
export async function withStreamingOutput<T>(
    terminal: Terminal,
    options: StreamingOptions,
    task: (onText: (chunk: string) => void) => Promise<T>
): Promise<{ value: T; streamed: boolean }> {
    const spinner = terminal.spinner()
    spinner.start(options.spinnerLabel)
    let streamed = false

    const onText = (chunk: string) => {
        if (!streamed) {
            spinner.stop()
            if (options.header) terminal.print(options.header)
            streamed = true
        }
        terminal.write(chunk)
    }

    try {
        const value = await task(onText)
        if (streamed) terminal.write('\n')
        else spinner.stop()
        return { value, streamed }
    } catch (error) {
        if (streamed) terminal.write('\n')
        else spinner.stop('Failed')
        throw error
    }
}

/**
 * Sends `prompt` in the current session and records the exchange once the
 * assistant has answered. Failures leave the transcript untouched.
 */
export async function runExchange(container: Container, prompt: string, signal?: AbortSignal): Promise<string> {
    const { session, assistant, terminal } = container

    const { value: reply, streamed } = await withStreamingOutput(
        terminal,
        { spinnerLabel: 'Consulting the archives...' },
        (onText) =>
            assistant.ask(prompt, {
                context: session.transcript.all(),
                resumeId: session.assistantSessionId,
                signal,
                onText,
            })
    )

    if (!streamed && reply.text) terminal.print(reply.text)
    terminal.print('')
    session.recordExchange(prompt, reply.text, reply.sessionId)
    return reply.text
}
