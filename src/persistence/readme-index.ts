const COUNT_PATTERN = /^(\d+) TILs & Counting$/
export const UNCATEGORIZED = 'uncategorized'

export interface IndexEntry {
    title: string
    /** Link target relative to the repository root, with forward slashes. */
    link: string
    category: string
}

function capitalize(s: string): string {
    return s.charAt(0).toUpperCase() + s.slice(1)
}

export function incrementTilCount(lines: string[]): void {
    for (let i = 0; i < lines.length; i++) {
        const match = COUNT_PATTERN.exec(lines[i]?.trim() ?? '')
        if (match?.[1]) {
            lines[i] = `${Number(match[1]) + 1} TILs & Counting`
            return
        }
    }
}

function findCategoryHeader(lines: string[], category: string): number {
    const header = `### ${category}`.toLowerCase()
    return lines.findIndex((l) => l.trim().toLowerCase() === header)
}

function findInsertionPoint(lines: string[], headerIdx: number): number {
    let idx = headerIdx + 1
    while (idx < lines.length) {
        const line = lines[idx] ?? ''
        if (line.startsWith('###') || line.startsWith('---')) break
        if (line.startsWith('- [') || !line.trim()) idx++
        else break
    }
    // insert above the blank line that closes the section
    if (idx > headerIdx + 1 && !(lines[idx - 1] ?? '').trim()) return idx - 1
    return idx
}

/** Index of the line that closes the `### Categories` list. */
export function findCategoriesEnd(lines: string[]): number | null {
    let inCategories = false
    for (let i = 0; i < lines.length; i++) {
        const line = lines[i] ?? ''
        if (line.trim() === '### Categories') {
            inCategories = true
        } else if (inCategories && (line.startsWith('---') || line.startsWith('###'))) {
            // keep the list tight: step back over trailing blank lines
            let end = i
            while (end > 0 && !(lines[end - 1] ?? '').trim() && (lines[end - 2] ?? '').startsWith('* [')) end--
            return end
        }
    }
    return null
}

function addCategory(lines: string[], entry: IndexEntry): void {
    const display = capitalize(entry.category)
    const categoriesEnd = findCategoriesEnd(lines)
    if (categoriesEnd !== null) {
        lines.splice(categoriesEnd, 0, `* [${display}](#${entry.category.toLowerCase()})`)
    }

    let end = lines.length
    while (end > 0 && !(lines[end - 1] ?? '').trim()) end--
    lines.splice(end, lines.length - end, '', `### ${display}`, '', `- [${entry.title}](${entry.link})`)
}

/** Returns the README with the entry added under its category section. */
export function addReadmeEntry(readme: string, entry: IndexEntry): string {
    const lines = readme.replace(/\n+$/, '').split('\n')
    incrementTilCount(lines)

    const headerIdx = findCategoryHeader(lines, entry.category)
    if (headerIdx >= 0) {
        lines.splice(findInsertionPoint(lines, headerIdx), 0, `- [${entry.title}](${entry.link})`)
    } else {
        addCategory(lines, entry)
    }
    return `${lines.join('\n')}\n`
}
