import { CONTEXT_CHAR_BUDGET } from '../config/defaults.js'
import { Transcript } from './transcript.js'
import type { LearningMode, Turn } from './types.js'

const ASSISTANT_TURN_CLIP = 500

export class Session {
    readonly transcript = new Transcript()
    mode: LearningMode | null = null
    category: string | null = null
    /** Conversation id reported by the assistant CLI, used to resume it. */
    assistantSessionId: string | null = null

    start(mode: LearningMode | null, category: string | null): void {
        this.mode = mode
        this.category = category
        this.assistantSessionId = null
        this.transcript.clear()
    }

    recordExchange(userText: string, assistantText: string, sessionId?: string): void {
        this.transcript.append('user', userText)
        this.transcript.append('assistant', assistantText)
        if (sessionId) this.assistantSessionId = sessionId
    }

    clear(): void {
        this.transcript.clear()
        this.assistantSessionId = null
    }

    get topic(): string | null {
        if (!this.mode) return null
        return this.mode.kind === 'deep_dive' ? this.mode.topic : this.mode.url
    }

    get isEmpty(): boolean {
        return this.transcript.size === 0
    }
}

export function describeMode(mode: LearningMode | null): string {
    if (!mode) return 'Open conversation'
    return mode.kind === 'deep_dive' ? `Deep Dive: ${mode.topic}` : `Link Analysis: ${mode.url}`
}

export function clip(text: string, max: number): string {
    return text.length <= max ? text : `${text.slice(0, max)}...`
}

function groupExchanges(turns: readonly Turn[]): Turn[][] {
    const groups: Turn[][] = []
    for (const turn of turns) {
        const last = groups[groups.length - 1]
        if (turn.role === 'user' || !last) groups.push([turn])
        else last.push(turn)
    }
    return groups
}

function renderExchange(turns: Turn[], index: number): string {
    const lines = [`--- Exchange ${index} ---`]
    for (const turn of turns) {
        if (turn.role === 'user') lines.push(`User: ${turn.text}`)
        else lines.push(`Assistant: ${clip(turn.text, ASSISTANT_TURN_CLIP)}`)
    }
    return lines.join('\n')
}

/**
 * Renders the session for a generation prompt. Whole exchanges are dropped
 * oldest-first until the rendering fits `budget` characters.
 */
export function buildSessionContext(session: Session, budget: number = CONTEXT_CHAR_BUDGET): string {
    const header: string[] = [`Learning Session: ${describeMode(session.mode)}`, '']
    if (session.category) header.push(`Category: ${session.category}`, '')
    header.push('Conversation Summary:')

    const blocks = groupExchanges(session.transcript.all()).map((turns, i) => renderExchange(turns, i + 1))

    const fixed = header.join('\n').length
    let total = fixed + blocks.reduce((sum, b) => sum + b.length + 2, 0)
    let dropped = 0
    while (total > budget && dropped < blocks.length) {
        total -= (blocks[dropped]?.length ?? 0) + 2
        dropped++
    }

    const kept = blocks.slice(dropped)
    const parts = [header.join('\n')]
    if (dropped > 0) parts.push(`(${dropped} earlier exchange${dropped === 1 ? '' : 's'} omitted)`)
    parts.push(...kept)
    return `${parts.join('\n\n')}\n`
}
