import type { Role, Turn } from './types.js'

/** Append-only, ordered log of the turns exchanged in one session. */
export class Transcript {
    private turns: Turn[] = []

    append(role: Role, text: string, timestamp: Date = new Date()): Turn {
        const turn: Turn = Object.freeze({ role, text, timestamp: timestamp.toISOString() })
        this.turns.push(turn)
        return turn
    }

    all(): readonly Turn[] {
        return [...this.turns]
    }

    clear(): void {
        this.turns = []
    }

    get size(): number {
        return this.turns.length
    }
}
