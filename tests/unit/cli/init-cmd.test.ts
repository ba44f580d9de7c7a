import { describe, expect, it } from 'vitest'
import { initCommand } from '../../../src/cli/commands/init-cmd.js'
import { MockFileSystem } from '../../../src/core/fs.js'
import { createTestRuntime } from '../../helpers/runtime.js'

describe('initCommand', () => {
    it('reports what it created and how to configure it', async () => {
        const fs = new MockFileSystem()
        const runtime = createTestRuntime({ fs })

        await initCommand(runtime, '/home/tester/til')

        expect(runtime.terminal.lines).toEqual([
            '✓ TIL repository ready at /home/tester/til',
            '  + archive/',
            '  + README.md',
            '  + .claude/commands/til.md',
            '  + .claude/commands/note.md',
            '',
            'Point Holocron at it with: holocron config --til-path /home/tester/til',
        ])
        expect(await fs.isDirectory('/home/tester/til/archive')).toBe(true)
    })

    it('lists what it kept when forced into an existing repository', async () => {
        const fs = new MockFileSystem()
        fs.setFile('/home/tester/til/README.md', '# mine\n')
        const runtime = createTestRuntime({ fs })

        await initCommand(runtime, '/home/tester/til', { force: true, archiveDir: 'entries' })

        expect(runtime.terminal.lines).toContain('  = README.md (kept)')
        expect(runtime.terminal.lines).toContain('  + entries/')
    })
})
