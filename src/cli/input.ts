import { type Interface, createInterface } from 'node:readline'
import { slashCommandNames } from './slash-commands.js'
import { colors } from './ui.js'

const HISTORY_SIZE = 200

/** Reads one REPL line at a time. `read` resolves null on EOF or Ctrl+C. */
export interface LineReader {
    read(): Promise<string | null>
    close(): void
}

export function completeSlashCommand(line: string): [string[], string] {
    if (!line.startsWith('/') || /\s/.test(line)) return [[], line]
    const prefix = line.toLowerCase()
    return [slashCommandNames().filter((name) => name.startsWith(prefix)), line]
}

/**
 * Opens a fresh readline interface for every line so that stdin is back in
 * cooked mode while the assistant runs and Ctrl+C reaches the process.
 * History is carried from one interface to the next.
 */
class TerminalLineReader implements LineReader {
    private history: string[] = []

    constructor(private readonly prompt: string) {}

    read(): Promise<string | null> {
        return new Promise((resolve) => {
            const rl = createInterface({
                input: process.stdin,
                output: process.stdout,
                completer: completeSlashCommand,
                history: [...this.history],
                historySize: HISTORY_SIZE,
                terminal: true,
            })

            let settled = false
            const finish = (value: string | null) => {
                if (settled) return
                settled = true
                rl.close()
                resolve(value)
            }

            rl.on('history', (history: string[]) => {
                this.history = history
            })
            rl.on('SIGINT', () => {
                process.stdout.write('\n')
                finish(null)
            })
            rl.on('close', () => finish(null))
            rl.question(this.prompt, (answer) => finish(answer))
        })
    }

    close(): void {}
}

/** Piped input keeps one interface so buffered lines are not lost. */
class PipedLineReader implements LineReader {
    private readonly rl: Interface
    private readonly lines: AsyncIterator<string>

    constructor() {
        this.rl = createInterface({ input: process.stdin, terminal: false })
        this.lines = this.rl[Symbol.asyncIterator]()
    }

    async read(): Promise<string | null> {
        const next = await this.lines.next()
        return next.done ? null : next.value
    }

    close(): void {
        this.rl.close()
    }
}

export function createLineReader(prompt = `${colors.brand('holocron')} ${colors.dim('>')} `): LineReader {
    return process.stdin.isTTY ? new TerminalLineReader(prompt) : new PipedLineReader()
}
