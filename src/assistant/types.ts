import type { Turn } from '../session/types.js'

export interface AskOptions {
    /** Prior turns; ignored when `resumeId` lets the assistant restore its own history. */
    context?: readonly Turn[]
    resumeId?: string | null
    signal?: AbortSignal
    onText?: (chunk: string) => void
}

export interface AssistantReply {
    text: string
    sessionId?: string
}

export interface AssistantClient {
    ask(prompt: string, options?: AskOptions): Promise<AssistantReply>
}
