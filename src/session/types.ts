export type Role = 'user' | 'assistant'

export interface Turn {
    readonly role: Role
    readonly text: string
    readonly timestamp: string
}

export type LearningMode = { kind: 'deep_dive'; topic: string } | { kind: 'link'; url: string }
