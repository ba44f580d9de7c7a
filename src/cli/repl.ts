import type { Container } from '../core/container.js'
import { describeMode } from '../session/session.js'
import { Dispatcher } from './dispatcher.js'
import { type LineReader, createLineReader } from './input.js'
import { banner, colors } from './ui.js'

export const FAREWELL = 'May the Force be with you.'

export interface ReplOptions {
    dispatcher?: Dispatcher
    reader?: LineReader
}

export async function startREPL(container: Container, options: ReplOptions = {}): Promise<void> {
    const { terminal, session, logger } = container
    const dispatcher = options.dispatcher ?? new Dispatcher(container)
    const reader = options.reader ?? createLineReader()

    terminal.print(banner())
    terminal.print(colors.dim(`Session: ${describeMode(session.mode)}`))
    terminal.print(colors.dim('Type /help for commands, /exit to quit\n'))

    const onSigint = () => {
        if (dispatcher.interrupt()) return
        dispatcher.exit()
        // unblocks a pending read
        reader.close()
    }
    process.on('SIGINT', onSigint)

    try {
        while (dispatcher.state !== 'exiting') {
            const line = await reader.read()
            if (line === null) break
            await dispatcher.dispatch(line)
        }
    } finally {
        process.removeListener('SIGINT', onSigint)
        reader.close()
    }

    logger.debug({ turns: session.transcript.size }, 'repl:exit')
    terminal.print(colors.brand(FAREWELL))
}
