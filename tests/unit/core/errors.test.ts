import { describe, expect, it } from 'vitest'
import {
    AssistantError,
    ConfigInvalidError,
    ConfigMissingError,
    IOFailureError,
    ValidationError,
    errorMessage,
    exitCodeFor,
    isAbortError,
} from '../../../src/core/errors.js'

describe('AssistantError', () => {
    it('marks a missing CLI as unavailable', () => {
        const error = new AssistantError({ reason: 'not_installed', command: 'claude' })
        expect(error.kind).toBe('assistant_unavailable')
        expect(error.message).toBe(
            'Assistant CLI "claude" was not found. Install it or set HOLOCRON_ASSISTANT_COMMAND.'
        )
    })

    it('marks missing authentication as unavailable', () => {
        expect(new AssistantError({ reason: 'not_authenticated' }).kind).toBe('assistant_unavailable')
    })

    it('describes exit codes with and without detail', () => {
        expect(new AssistantError({ reason: 'non_zero_exit', exitCode: 3 }).message).toBe('Assistant exited with code 3')
        const withDetail = new AssistantError({ reason: 'non_zero_exit', exitCode: 2, detail: 'boom' })
        expect(withDetail.message).toBe('Assistant exited with code 2: boom')
        expect(withDetail.kind).toBe('assistant_failed')
    })

    it('reports timeouts in seconds', () => {
        const error = new AssistantError({ reason: 'timeout', timeoutMs: 300_000 })
        expect(error.message).toBe('Assistant did not answer within 300s')
        expect(error.kind).toBe('assistant_failed')
    })
})

describe('isAbortError', () => {
    it('recognises aborted assistant calls and signal aborts', () => {
        expect(isAbortError(new AssistantError({ reason: 'aborted' }))).toBe(true)
        const controller = new AbortController()
        controller.abort()
        expect(isAbortError(controller.signal.reason)).toBe(true)
    })

    it('ignores other failures', () => {
        expect(isAbortError(new AssistantError({ reason: 'timeout', timeoutMs: 1000 }))).toBe(false)
        expect(isAbortError(new Error('nope'))).toBe(false)
        expect(isAbortError('AbortError')).toBe(false)
    })
})

describe('exitCodeFor', () => {
    it('uses 2 for validation failures', () => {
        expect(exitCodeFor(new ValidationError('bad flag'))).toBe(2)
    })

    it('uses 1 for everything else', () => {
        expect(exitCodeFor(new ConfigInvalidError('bad file'))).toBe(1)
        expect(exitCodeFor(new ConfigMissingError())).toBe(1)
        expect(exitCodeFor(new IOFailureError('disk full', '/til'))).toBe(1)
        expect(exitCodeFor(new Error('unknown'))).toBe(1)
    })
})

describe('errorMessage', () => {
    it('stringifies non-errors', () => {
        expect(errorMessage(new Error('x'))).toBe('x')
        expect(errorMessage(42)).toBe('42')
    })
})
