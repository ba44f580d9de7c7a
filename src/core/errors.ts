export type ErrorKind =
    | 'config_invalid'
    | 'config_missing'
    | 'assistant_unavailable'
    | 'assistant_failed'
    | 'io_failure'
    | 'validation_failure'

export class HolocronError extends Error {
    readonly kind: ErrorKind

    constructor(message: string, kind: ErrorKind, options?: ErrorOptions) {
        super(message, options)
        this.name = 'HolocronError'
        this.kind = kind
    }
}

export class ConfigInvalidError extends HolocronError {
    constructor(message: string, options?: ErrorOptions) {
        super(message, 'config_invalid', options)
        this.name = 'ConfigInvalidError'
    }
}

export class ConfigMissingError extends HolocronError {
    constructor(message = 'Holocron is not configured. Run `holocron` in a terminal to set it up.') {
        super(message, 'config_missing')
        this.name = 'ConfigMissingError'
    }
}

export class ValidationError extends HolocronError {
    constructor(message: string, options?: ErrorOptions) {
        super(message, 'validation_failure', options)
        this.name = 'ValidationError'
    }
}

export class IOFailureError extends HolocronError {
    readonly path: string

    constructor(message: string, path: string, options?: ErrorOptions) {
        super(message, 'io_failure', options)
        this.name = 'IOFailureError'
        this.path = path
    }
}

export type AssistantFailure =
    | { reason: 'not_installed'; command: string }
    | { reason: 'not_authenticated'; detail?: string }
    | { reason: 'non_zero_exit'; exitCode: number; detail?: string }
    | { reason: 'timeout'; timeoutMs: number }
    | { reason: 'aborted' }

function describeFailure(failure: AssistantFailure): string {
    switch (failure.reason) {
        case 'not_installed':
            return `Assistant CLI "${failure.command}" was not found. Install it or set HOLOCRON_ASSISTANT_COMMAND.`
        case 'not_authenticated':
            return 'Assistant CLI is not authenticated. Log in to it and try again.'
        case 'non_zero_exit':
            return failure.detail
                ? `Assistant exited with code ${failure.exitCode}: ${failure.detail}`
                : `Assistant exited with code ${failure.exitCode}`
        case 'timeout':
            return `Assistant did not answer within ${Math.round(failure.timeoutMs / 1000)}s`
        case 'aborted':
            return 'Assistant call interrupted'
    }
}

export class AssistantError extends HolocronError {
    readonly failure: AssistantFailure

    constructor(failure: AssistantFailure, options?: ErrorOptions) {
        const kind = failure.reason === 'not_installed' || failure.reason === 'not_authenticated'
            ? 'assistant_unavailable'
            : 'assistant_failed'
        super(describeFailure(failure), kind, options)
        this.name = 'AssistantError'
        this.failure = failure
    }
}

export function errorMessage(error: unknown): string {
    if (error instanceof Error) return error.message
    return String(error)
}

export function isAbortError(error: unknown): boolean {
    if (error instanceof AssistantError) return error.failure.reason === 'aborted'
    if (error instanceof Error && error.name === 'AbortError') return true
    return false
}

export function exitCodeFor(error: unknown): number {
    if (error instanceof HolocronError && error.kind === 'validation_failure') return 2
    return 1
}
