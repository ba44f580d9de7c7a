import { describe, expect, it } from 'vitest'
import { runProcess } from '../../../src/assistant/process-runner.js'

const NODE = process.execPath

function script(source: string): string[] {
    return ['-e', source]
}

describe('runProcess', () => {
    it('streams stdout line by line', async () => {
        const lines: string[] = []
        const outcome = await runProcess(NODE, script("console.log('a'); console.log('b')"), {
            timeoutMs: 10_000,
            onLine: (line) => lines.push(line),
        })

        expect(outcome).toEqual({ kind: 'exited', exitCode: 0, stderr: '' })
        expect(lines).toEqual(['a', 'b'])
    })

    it('reports the exit code and stderr of a failing command', async () => {
        const outcome = await runProcess(NODE, script("process.stderr.write('boom'); process.exit(3)"), {
            timeoutMs: 10_000,
            onLine: () => {},
        })
        expect(outcome).toEqual({ kind: 'exited', exitCode: 3, stderr: 'boom' })
    })

    it('reports a command that is not installed', async () => {
        const outcome = await runProcess('holocron-no-such-command', [], { timeoutMs: 10_000, onLine: () => {} })
        expect(outcome).toEqual({ kind: 'not_found' })
    })

    it('stops a command that outlives its timeout', async () => {
        const outcome = await runProcess(NODE, script('setTimeout(() => {}, 30000)'), {
            timeoutMs: 200,
            onLine: () => {},
        })
        expect(outcome).toEqual({ kind: 'timed_out' })
    })

    it('stops a command when the signal aborts', async () => {
        const controller = new AbortController()
        const running = runProcess(NODE, script('setTimeout(() => {}, 30000)'), {
            timeoutMs: 10_000,
            signal: controller.signal,
            onLine: () => {},
        })
        setTimeout(() => controller.abort(), 100)

        expect(await running).toEqual({ kind: 'canceled' })
    })
})
