import os from 'node:os'
import path from 'node:path'
import { describe, expect, it } from 'vitest'
import { ensureConfig } from '../../../src/cli/setup.js'
import { ConfigMissingError } from '../../../src/core/errors.js'
import { MockFileSystem } from '../../../src/core/fs.js'
import { TEST_CONFIG, createTestRuntime } from '../../helpers/runtime.js'

describe('ensureConfig', () => {
    it('returns the stored config without asking anything', async () => {
        const runtime = createTestRuntime()
        await runtime.configStore.save(TEST_CONFIG)

        expect(await ensureConfig(runtime)).toEqual(TEST_CONFIG)
        expect(runtime.terminal.prompts).toEqual([])
    })

    it('refuses to prompt in a non-interactive terminal', async () => {
        const runtime = createTestRuntime()
        runtime.terminal.interactive = false
        await expect(ensureConfig(runtime)).rejects.toBeInstanceOf(ConfigMissingError)
    })

    it('creates a TIL repository for a new path and saves the config', async () => {
        const fs = new MockFileSystem()
        const runtime = createTestRuntime({ fs, answers: ['/home/tester/til', true, ''] })

        const config = await ensureConfig(runtime)

        expect(runtime.terminal.lines[0]).toBe("Welcome to Holocron! Let's get you set up.")
        expect(config).toEqual({ tilPath: '/home/tester/til', archiveDir: 'archive', notesFormat: 'obsidian' })
        expect(runtime.terminal.prompts).toEqual([
            'Where is your TIL repository?',
            '/home/tester/til does not exist. Create a TIL repository there?',
            'Where should detailed notes go? (leave empty to skip)',
        ])
        expect(await fs.exists('/home/tester/til/README.md')).toBe(true)
        expect(await runtime.configStore.load()).toEqual(config)
    })

    it('installs missing skills into an existing repository and asks for the notes format', async () => {
        const fs = new MockFileSystem()
        fs.setFile('/home/tester/til/README.md', '# mine\n')
        const runtime = createTestRuntime({ fs, answers: ['/home/tester/til', true, '/home/tester/notes', 'plain'] })

        const config = await ensureConfig(runtime)

        expect(config).toEqual({
            tilPath: '/home/tester/til',
            archiveDir: 'archive',
            notesPath: '/home/tester/notes',
            notesFormat: 'plain',
        })
        expect(await fs.readText('/home/tester/til/README.md')).toBe('# mine\n')
        expect(await fs.exists('/home/tester/til/.claude/commands/til.md')).toBe(true)
    })

    it('expands ~ in the TIL path', async () => {
        const runtime = createTestRuntime({ answers: ['~/til-here', false, ''] })
        const config = await ensureConfig(runtime)
        expect(config?.tilPath).toBe(path.join(os.homedir(), 'til-here'))
    })

    it('saves nothing when cancelled', async () => {
        const runtime = createTestRuntime({ answers: [null] })
        expect(await ensureConfig(runtime)).toBeNull()
        expect(await runtime.configStore.exists()).toBe(false)
    })
})
