import { describe, expect, it } from 'vitest'
import { configCommand } from '../../../src/cli/commands/config-cmd.js'
import { ConfigMissingError, ValidationError } from '../../../src/core/errors.js'
import { TEST_CONFIG, TEST_CONFIG_PATH, createTestRuntime } from '../../helpers/runtime.js'

describe('configCommand', () => {
    it('shows the current configuration', async () => {
        const runtime = createTestRuntime()
        await runtime.configStore.save(TEST_CONFIG)

        await configCommand(runtime, {})

        const { lines } = runtime.terminal
        expect(lines[0]).toBe('Current Configuration')
        expect(lines).toContain('  TIL path      /til')
        expect(lines).toContain('  Notes path    /notes')
        expect(lines).toContain('  Notes format  obsidian')
        expect(lines.at(-1)).toBe(`Config file: ${TEST_CONFIG_PATH}`)
    })

    it('fails without a config in a non-interactive terminal', async () => {
        const runtime = createTestRuntime()
        runtime.terminal.interactive = false
        await expect(configCommand(runtime, {})).rejects.toBeInstanceOf(ConfigMissingError)
    })

    it('needs --til-path to create a config from flags', async () => {
        const runtime = createTestRuntime()
        await expect(configCommand(runtime, { notesFormat: 'plain' })).rejects.toThrow(
            'No configuration exists yet. Pass --til-path to create one.'
        )
    })

    it('creates a config from flags', async () => {
        const runtime = createTestRuntime()

        await configCommand(runtime, { tilPath: '/home/tester/til', notesFormat: 'Logseq' })

        expect(await runtime.configStore.load()).toEqual({
            tilPath: '/home/tester/til',
            archiveDir: 'archive',
            notesFormat: 'logseq',
        })
        expect(runtime.terminal.lines[0]).toBe('✓ Configuration updated')
    })

    it('updates only the given fields', async () => {
        const runtime = createTestRuntime()
        await runtime.configStore.save(TEST_CONFIG)

        await configCommand(runtime, { notesPath: '/home/tester/kb', archiveDir: 'entries' })

        expect(await runtime.configStore.load()).toEqual({
            ...TEST_CONFIG,
            notesPath: '/home/tester/kb',
            archiveDir: 'entries',
        })
    })

    it('rejects an unknown notes format and keeps the stored config', async () => {
        const runtime = createTestRuntime()
        await runtime.configStore.save(TEST_CONFIG)

        await expect(configCommand(runtime, { notesFormat: 'roam' })).rejects.toBeInstanceOf(ValidationError)
        expect(await runtime.configStore.load()).toEqual(TEST_CONFIG)
    })

    it('rejects an empty TIL path', async () => {
        const runtime = createTestRuntime()
        await expect(configCommand(runtime, { tilPath: '  ' })).rejects.toThrow('TIL path cannot be empty')
    })
})
