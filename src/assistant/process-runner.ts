import { createInterface } from 'node:readline'
import { ExecaError, execa } from 'execa'

export interface RunOptions {
    timeoutMs: number
    signal?: AbortSignal
    onLine: (line: string) => void
}

export type ProcessOutcome =
    | { kind: 'exited'; exitCode: number; stderr: string }
    | { kind: 'not_found' }
    | { kind: 'timed_out' }
    | { kind: 'canceled' }

export type ProcessRunner = (command: string, args: string[], options: RunOptions) => Promise<ProcessOutcome>

/** Spawns `command`, feeding each stdout line to `onLine` as it arrives. */
export const runProcess: ProcessRunner = async (command, args, options) => {
    const subprocess = execa(command, args, {
        stdin: 'ignore',
        timeout: options.timeoutMs,
        cancelSignal: options.signal,
    })

    const lines = createInterface({ input: subprocess.stdout })
    lines.on('line', options.onLine)

    try {
        const result = await subprocess
        return { kind: 'exited', exitCode: result.exitCode ?? 0, stderr: result.stderr }
    } catch (error) {
        if (!(error instanceof ExecaError)) throw error
        if (error.code === 'ENOENT') return { kind: 'not_found' }
        if (error.timedOut) return { kind: 'timed_out' }
        if (error.isCanceled) return { kind: 'canceled' }
        return { kind: 'exited', exitCode: error.exitCode ?? 1, stderr: String(error.stderr ?? '') }
    } finally {
        lines.close()
    }
}
