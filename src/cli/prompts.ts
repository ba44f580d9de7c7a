import { CATEGORY_PRESETS } from '../config/defaults.js'
import { NOTES_FORMATS, type NotesFormat } from '../config/schema.js'
import type { GeneratedArtifact } from '../generators/types.js'
import type { Terminal } from './terminal.js'

const CUSTOM = '__custom__'
const SKIP = '__skip__'

export async function askCategory(terminal: Terminal): Promise<string | null> {
    const choice = await terminal.select('Category for TIL', [
        ...CATEGORY_PRESETS.map((c) => ({ value: c, label: c })),
        { value: CUSTOM, label: 'Other (type custom)' },
        { value: SKIP, label: 'Skip (decide later)' },
    ])

    if (choice === null || choice === SKIP) return null
    if (choice !== CUSTOM) return choice

    const custom = await terminal.text('Enter category', {
        validate: (value) => (value.trim() ? undefined : 'Category cannot be empty'),
    })
    return custom ? custom.trim().toLowerCase() : null
}

export type SaveDecision = { action: 'save'; path?: string } | { action: 'discard' }

export async function askSaveDecision(terminal: Terminal, artifact: GeneratedArtifact): Promise<SaveDecision> {
    const noun = artifact.kind === 'til' ? 'TIL' : 'note'
    const choice = await terminal.select(`Save ${noun} as ${artifact.suggestedPath}?`, [
        { value: 'save', label: 'Yes, save it' },
        { value: 'elsewhere', label: 'Yes, but somewhere else', hint: `relative to ${artifact.root}` },
        { value: 'discard', label: 'No, discard' },
    ])

    if (choice === 'save') return { action: 'save' }
    if (choice !== 'elsewhere') return { action: 'discard' }

    const override = await terminal.text('Path to save to', {
        placeholder: 'category/file_name.md',
        validate: (value) => (value.trim() ? undefined : 'Path cannot be empty'),
    })
    if (!override) return { action: 'discard' }
    return { action: 'save', path: override.trim() }
}

export async function askNotesFormat(terminal: Terminal, current?: NotesFormat): Promise<NotesFormat | null> {
    const labels: Record<NotesFormat, string> = {
        obsidian: 'Obsidian',
        logseq: 'Logseq',
        plain: 'Plain markdown',
    }
    return terminal.select(
        'Notes format',
        NOTES_FORMATS.map((f) => ({ value: f, label: labels[f] })),
        current
    )
}
