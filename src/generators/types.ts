import type { AssistantClient } from '../assistant/types.js'
import type { HolocronConfig } from '../config/schema.js'
import type { Session } from '../session/session.js'

export type ArtifactKind = 'til' | 'note'

export interface GeneratedArtifact {
    kind: ArtifactKind
    title: string
    body: string
    category?: string
    /** Absolute path the artifact is offered to be saved at. */
    suggestedPath: string
    /** Directory relative path overrides are resolved against. */
    root: string
    /** True when the session was empty and the assistant was not consulted. */
    skeleton: boolean
}

export interface GenerationRequest {
    session: Session
    config: HolocronConfig
    assistant: AssistantClient
    signal?: AbortSignal
    onText?: (chunk: string) => void
    now?: Date
}
