import { describe, expect, it } from 'vitest'
import type { LineReader } from '../../../src/cli/input.js'
import { completeSlashCommand } from '../../../src/cli/input.js'
import { FAREWELL, startREPL } from '../../../src/cli/repl.js'
import { TEST_CONFIG, createTestContainer } from '../../helpers/runtime.js'
import { ScriptedAssistant } from '../../helpers/scripted-assistant.js'

class ScriptedReader implements LineReader {
    closed = false

    constructor(private lines: Array<string | null>) {}

    async read(): Promise<string | null> {
        return this.lines.shift() ?? null
    }

    close(): void {
        this.closed = true
    }
}

/** Blocks on read until closed, like piped stdin with nothing buffered. */
class WaitingReader implements LineReader {
    private release: (line: string | null) => void = () => {}

    read(): Promise<string | null> {
        return new Promise((resolve) => {
            this.release = resolve
        })
    }

    close(): void {
        this.release(null)
    }
}

describe('startREPL', () => {
    it('runs lines until /exit and says goodbye', async () => {
        const assistant = new ScriptedAssistant([{ text: 'hi there' }])
        const { runtime, container } = createTestContainer(TEST_CONFIG, { assistant })
        const reader = new ScriptedReader(['hello', '/exit', 'never read'])
        const listeners = process.listenerCount('SIGINT')

        await startREPL(container, { reader })

        expect(runtime.terminal.lines[1]).toContain('HOLOCRON - Your Learning Assistant')
        expect(runtime.terminal.lines.at(-1)).toBe(FAREWELL)
        expect(assistant.calls).toHaveLength(1)
        expect(reader.closed).toBe(true)
        expect(process.listenerCount('SIGINT')).toBe(listeners)
    })

    it('exits on end of input', async () => {
        const { runtime, container } = createTestContainer()
        await startREPL(container, { reader: new ScriptedReader([]) })
        expect(runtime.terminal.lines.at(-1)).toBe('May the Force be with you.')
    })

    it('ends the loop on Ctrl+C at an idle prompt', async () => {
        const { runtime, container } = createTestContainer()
        const listeners = process.listeners('SIGINT')

        const done = startREPL(container, { reader: new WaitingReader() })
        const onSigint = process.listeners('SIGINT').find((l) => !listeners.includes(l))
        expect(onSigint).toBeDefined()
        onSigint?.('SIGINT')
        await done

        expect(runtime.terminal.lines.at(-1)).toBe(FAREWELL)
        expect(process.listeners('SIGINT')).toEqual(listeners)
    })
})

describe('completeSlashCommand', () => {
    it('completes command names and aliases', () => {
        expect(completeSlashCommand('/l')).toEqual([['/learn', '/link'], '/l'])
        expect(completeSlashCommand('/q')).toEqual([['/quit'], '/q'])
    })

    it('does not complete arguments or plain text', () => {
        expect(completeSlashCommand('/learn gi')).toEqual([[], '/learn gi'])
        expect(completeSlashCommand('hello')).toEqual([[], 'hello'])
    })
})
