import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import { buildDeepDivePrompt } from '../../../src/assistant/prompts.js'
import { runCli } from '../../../src/cli/program.js'
import { AssistantError } from '../../../src/core/errors.js'
import { MockFileSystem } from '../../../src/core/fs.js'
import { TEST_CONFIG, TEST_CONFIG_PATH, createTestRuntime } from '../../helpers/runtime.js'
import { ScriptedAssistant } from '../../helpers/scripted-assistant.js'

const argv = (...args: string[]) => ['node', 'holocron', ...args]

describe('runCli', () => {
    let errors: string[]

    beforeEach(() => {
        errors = []
        vi.spyOn(console, 'error').mockImplementation((message: unknown) => {
            errors.push(String(message))
        })
    })

    afterEach(() => {
        vi.restoreAllMocks()
    })

    it('runs a one-shot deep dive and prints the answer', async () => {
        const assistant = new ScriptedAssistant([{ text: 'Lifetimes tie borrows to scopes.' }])
        const runtime = createTestRuntime({ assistant })
        await runtime.configStore.save(TEST_CONFIG)

        const code = await runCli(argv('learn', 'rust', 'lifetimes', '--category', 'Rust'), runtime)

        expect(code).toBe(0)
        expect(assistant.calls[0]?.prompt).toBe(buildDeepDivePrompt('rust lifetimes'))
        expect(runtime.terminal.lines[0]).toBe('Deep Dive: rust lifetimes [rust]')
        expect(runtime.terminal.written).toBe('Lifetimes tie borrows to scopes.\n')
    })

    it('exits non-zero without side effects when the assistant is missing', async () => {
        const fs = new MockFileSystem()
        const assistant = new ScriptedAssistant([new AssistantError({ reason: 'not_installed', command: 'claude' })])
        const runtime = createTestRuntime({ fs, assistant })
        await runtime.configStore.save(TEST_CONFIG)

        const code = await runCli(argv('learn', 'git'), runtime)

        expect(code).toBe(1)
        expect(errors[0]).toContain('Assistant CLI "claude" was not found.')
        expect([...fs.getFiles().keys()]).toEqual([TEST_CONFIG_PATH])
    })

    it('rejects an invalid link with the validation exit code', async () => {
        const assistant = new ScriptedAssistant([])
        const runtime = createTestRuntime({ assistant })
        await runtime.configStore.save(TEST_CONFIG)

        expect(await runCli(argv('link', 'not-a-url'), runtime)).toBe(2)
        expect(assistant.calls).toHaveLength(0)
    })

    it('fails when unconfigured and not interactive', async () => {
        const runtime = createTestRuntime()
        runtime.terminal.interactive = false

        expect(await runCli(argv('learn', 'git'), runtime)).toBe(1)
        expect(errors[0]).toContain('Holocron is not configured.')
    })

    it('initialises a TIL repository', async () => {
        const fs = new MockFileSystem()
        const runtime = createTestRuntime({ fs })

        expect(await runCli(argv('init', '/home/tester/til', '--archive-dir', 'entries'), runtime)).toBe(0)
        expect(await fs.isDirectory('/home/tester/til/entries')).toBe(true)
    })

    it('refuses to initialise a non-empty directory', async () => {
        const fs = new MockFileSystem()
        fs.setFile('/home/tester/til/notes.txt', 'mine')
        const runtime = createTestRuntime({ fs })

        expect(await runCli(argv('init', '/home/tester/til'), runtime)).toBe(2)
        expect(await fs.exists('/home/tester/til/README.md')).toBe(false)
    })

    it('updates the config from flags', async () => {
        const runtime = createTestRuntime()
        await runtime.configStore.save(TEST_CONFIG)

        expect(await runCli(argv('config', '--notes-format', 'plain'), runtime)).toBe(0)
        expect((await runtime.configStore.load())?.notesFormat).toBe('plain')

        expect(await runCli(argv('config', '--notes-format', 'roam'), runtime)).toBe(2)
        expect(errors[0]).toContain('Invalid notes format "roam". Use: obsidian, logseq, plain')
    })
})
