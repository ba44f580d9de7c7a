import path from 'node:path'
import { buildSessionContext } from '../session/session.js'
import { extractHeading, titleToFilename, unwrapMarkdownFence } from './markdown.js'
import type { GeneratedArtifact, GenerationRequest } from './types.js'

export const TIL_FALLBACK_TITLE = 'Untitled TIL'

export function buildTilPrompt(context: string): string {
    return `Based on our learning session, generate a TIL (Today I Learned) entry.

${context}
The TIL should capture the single most important, actionable learning from this session - something someone could quickly reference later.

Format:
- An H1 title describing the action or fact
- A short intro explaining when or why this matters
- Working code examples, one idea per code block, with prose around them
- End with one practical takeaway
- 10-30 lines in total

Return ONLY the markdown content. No preamble.`
}

export function tilArchiveRoot(request: Pick<GenerationRequest, 'config'>): string {
    return path.join(request.config.tilPath, request.config.archiveDir)
}

export function tilSuggestedPath(archiveRoot: string, category: string | null, title: string): string {
    const filename = titleToFilename(title)
    return category ? path.join(archiveRoot, category.toLowerCase(), filename) : path.join(archiveRoot, filename)
}

function skeletonTil(request: GenerationRequest): GeneratedArtifact {
    const { session } = request
    const title = session.topic ?? TIL_FALLBACK_TITLE
    const root = tilArchiveRoot(request)
    return {
        kind: 'til',
        title,
        body: `# ${title}\n\nNothing was discussed in this session yet.\n`,
        category: session.category ?? undefined,
        suggestedPath: tilSuggestedPath(root, session.category, title),
        root,
        skeleton: true,
    }
}

export async function generateTil(request: GenerationRequest): Promise<GeneratedArtifact> {
    const { session, assistant } = request
    if (session.isEmpty) return skeletonTil(request)

    const prompt = buildTilPrompt(buildSessionContext(session))
    const reply = await assistant.ask(prompt, {
        resumeId: session.assistantSessionId,
        signal: request.signal,
        onText: request.onText,
    })

    const body = unwrapMarkdownFence(reply.text)
    const title = extractHeading(body) ?? TIL_FALLBACK_TITLE
    const root = tilArchiveRoot(request)

    return {
        kind: 'til',
        title,
        body,
        category: session.category ?? undefined,
        suggestedPath: tilSuggestedPath(root, session.category, title),
        root,
        skeleton: false,
    }
}
