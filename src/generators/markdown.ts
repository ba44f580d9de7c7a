import matter from 'gray-matter'

/** First `# ` heading in the document. */
export function extractHeading(content: string): string | null {
    for (const line of content.split('\n')) {
        const trimmed = line.trim()
        if (trimmed.startsWith('# ')) {
            const title = trimmed.slice(2).trim()
            if (title) return title
        }
    }
    return null
}

/** Front-matter `title`, falling back to the first heading. */
export function extractNoteTitle(content: string): string | null {
    if (!matter.test(content)) return extractHeading(content)

    let data: Record<string, unknown>
    try {
        data = matter(content).data
    } catch {
        // malformed YAML
        return extractHeading(content)
    }
    const title = data.title
    return typeof title === 'string' && title.trim() ? title.trim() : extractHeading(content)
}

export function titleToFilename(title: string): string {
    const slug = title
        .toLowerCase()
        .replace(/[^\p{L}\p{N}]+/gu, '_')
        .replace(/^_+|_+$/g, '')
    return `${slug || 'untitled'}.md`
}

const FENCE_LINE = /^\s*```/
const BARE_FENCE_LINE = /^\s*```\s*$/

/**
 * True when every fence inside `body` belongs to a nested block. A bare
 * fence at the outer level would close the wrapper early.
 */
function fencesAreNested(body: string): boolean {
    let open = false
    for (const line of body.split('\n')) {
        if (!FENCE_LINE.test(line)) continue
        const bare = BARE_FENCE_LINE.test(line)
        if (open) {
            if (bare) open = false
        } else if (bare) {
            return false
        } else {
            open = true
        }
    }
    return !open
}

/** Removes a single code fence wrapping the whole reply. */
export function unwrapMarkdownFence(content: string): string {
    const match = /^\s*```(?:markdown|md)?[ \t]*\n([\s\S]*?)\n```\s*$/.exec(content)
    const body = match?.[1]
    if (body === undefined || !fencesAreNested(body)) return content.trim()
    return body
}

export function ensureTrailingNewline(content: string): string {
    return content.endsWith('\n') ? content : `${content}\n`
}

export function formatDate(date: Date): string {
    return date.toISOString().slice(0, 10)
}
