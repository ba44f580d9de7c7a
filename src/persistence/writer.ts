import path from 'node:path'
import type { HolocronConfig } from '../config/schema.js'
import { HolocronError, IOFailureError, errorMessage } from '../core/errors.js'
import type { FileSystem } from '../core/fs.js'
import { expandHome } from '../core/paths.js'
import { type Result, err, ok } from '../core/result.js'
import { ensureTrailingNewline } from '../generators/markdown.js'
import type { GeneratedArtifact } from '../generators/types.js'
import type { Logger } from '../logger/index.js'
import { UNCATEGORIZED, addReadmeEntry } from './readme-index.js'

export interface SavedArtifact {
    path: string
    /** Set when the file was written but the README index could not be updated. */
    indexWarning?: string
}

export function resolveTarget(artifact: GeneratedArtifact, overridePath?: string): string {
    let target = artifact.suggestedPath
    if (overridePath?.trim()) {
        const expanded = expandHome(overridePath.trim())
        target = path.isAbsolute(expanded) ? expanded : path.join(artifact.root, expanded)
    }
    return target.toLowerCase().endsWith('.md') ? target : `${target}.md`
}

async function firstFreePath(fs: FileSystem, target: string): Promise<string> {
    if (!(await fs.exists(target))) return target
    const ext = path.extname(target)
    const base = target.slice(0, -ext.length)
    for (let n = 2; ; n++) {
        const candidate = `${base}_${n}${ext}`
        if (!(await fs.exists(candidate))) return candidate
    }
}

async function updateReadme(
    fs: FileSystem,
    config: HolocronConfig,
    artifact: GeneratedArtifact,
    target: string
): Promise<void> {
    const readmePath = path.join(config.tilPath, 'README.md')
    if (!(await fs.exists(readmePath))) return

    const archiveRoot = path.join(config.tilPath, config.archiveDir)
    const fromArchive = path.relative(archiveRoot, target)
    if (fromArchive.startsWith('..') || path.isAbsolute(fromArchive)) return

    const segments = fromArchive.split(path.sep)
    const category = segments.length > 1 ? (segments[0] ?? UNCATEGORIZED) : UNCATEGORIZED
    const link = path.relative(config.tilPath, target).split(path.sep).join('/')

    const readme = await fs.readText(readmePath)
    await fs.writeText(readmePath, addReadmeEntry(readme, { title: artifact.title, link, category }))
}

/**
 * Writes the artifact to `overridePath` or its suggested path. Existing files
 * are never overwritten; a numeric suffix is appended instead.
 */
export async function saveArtifact(
    fs: FileSystem,
    artifact: GeneratedArtifact,
    config: HolocronConfig,
    logger: Logger,
    overridePath?: string
): Promise<Result<SavedArtifact, HolocronError>> {
    let target = resolveTarget(artifact, overridePath)
    try {
        await fs.mkdir(path.dirname(target))
        target = await firstFreePath(fs, target)
        await fs.writeText(target, ensureTrailingNewline(artifact.body))
    } catch (error) {
        logger.warn({ path: target, error: errorMessage(error) }, 'artifact:write-failed')
        return err(new IOFailureError(`Failed to write ${target}: ${errorMessage(error)}`, target, { cause: error }))
    }
    logger.debug({ path: target, kind: artifact.kind }, 'artifact:saved')

    if (artifact.kind !== 'til') return ok({ path: target })

    try {
        await updateReadme(fs, config, artifact, target)
        return ok({ path: target })
    } catch (error) {
        logger.warn({ error: errorMessage(error) }, 'readme:update-failed')
        return ok({ path: target, indexWarning: `README.md was not updated: ${errorMessage(error)}` })
    }
}
