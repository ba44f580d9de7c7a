import path from 'node:path'
import matter from 'gray-matter'
import type { NotesFormat } from '../config/schema.js'
import { ConfigInvalidError } from '../core/errors.js'
import { buildSessionContext } from '../session/session.js'
import { extractNoteTitle, formatDate, titleToFilename, unwrapMarkdownFence } from './markdown.js'
import type { GeneratedArtifact, GenerationRequest } from './types.js'

export const NOTE_FALLBACK_TITLE = 'Untitled Note'

const LINK_STYLE: Record<NotesFormat, string> = {
    obsidian: 'Related topics as [[wiki-links]]',
    logseq: 'Related topics as [[page links]]',
    plain: 'Related topics as regular markdown links or plain text (no wiki-link syntax)',
}

export function buildNotePrompt(context: string, format: NotesFormat, sourceUrl: string | null): string {
    const sections = [
        '- YAML front-matter with title, date, tags, and aliases',
        '- An overview of the concept',
        '- Detailed explanations of the key concepts',
        '- Code examples with annotations',
        '- Key insights from our Q&A',
        `- ${LINK_STYLE[format]}`,
    ]
    if (sourceUrl) sections.push(`- A Sources section listing ${sourceUrl}`)

    return `Based on our learning session, generate a comprehensive knowledge base note.

${context}
The note should be thorough and detailed - this is for a personal knowledge base, not a quick reference.

Include:
${sections.join('\n')}

Return ONLY the markdown content, starting with the YAML front-matter. No preamble.`
}

export function notesRoot(request: Pick<GenerationRequest, 'config'>): string {
    const { notesPath } = request.config
    if (!notesPath) {
        throw new ConfigInvalidError('Notes path not configured. Run: holocron config --notes-path <path>')
    }
    return notesPath
}

/** Prepends front-matter when the assistant left it out. */
export function ensureFrontMatter(body: string, title: string, category: string | null, date: Date): string {
    if (matter.test(body)) return body
    return matter.stringify(body, {
        title,
        date: formatDate(date),
        tags: category ? [category] : [],
        aliases: [],
    })
}

function skeletonNote(request: GenerationRequest, root: string): GeneratedArtifact {
    const { session } = request
    const title = session.topic ?? NOTE_FALLBACK_TITLE
    const body = ensureFrontMatter(
        `# ${title}\n\nNothing was discussed in this session yet.\n`,
        title,
        session.category,
        request.now ?? new Date()
    )
    return {
        kind: 'note',
        title,
        body,
        category: session.category ?? undefined,
        suggestedPath: path.join(root, titleToFilename(title)),
        root,
        skeleton: true,
    }
}

export async function generateNote(request: GenerationRequest): Promise<GeneratedArtifact> {
    const { session, assistant, config } = request
    const root = notesRoot(request)
    if (session.isEmpty) return skeletonNote(request, root)

    const sourceUrl = session.mode?.kind === 'link' ? session.mode.url : null
    const prompt = buildNotePrompt(buildSessionContext(session), config.notesFormat, sourceUrl)
    const reply = await assistant.ask(prompt, {
        resumeId: session.assistantSessionId,
        signal: request.signal,
        onText: request.onText,
    })

    const raw = unwrapMarkdownFence(reply.text)
    const title = extractNoteTitle(raw) ?? NOTE_FALLBACK_TITLE
    const body = ensureFrontMatter(raw, title, session.category, request.now ?? new Date())

    return {
        kind: 'note',
        title,
        body,
        category: session.category ?? undefined,
        suggestedPath: path.join(root, titleToFilename(title)),
        root,
        skeleton: false,
    }
}
