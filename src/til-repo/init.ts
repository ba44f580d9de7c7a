import path from 'node:path'
import { DEFAULT_ARCHIVE_DIR } from '../config/defaults.js'
import { IOFailureError, ValidationError, errorMessage } from '../core/errors.js'
import type { FileSystem } from '../core/fs.js'
import { NOTE_SKILL, README_TEMPLATE, TIL_SKILL } from './templates.js'

export interface InitOptions {
    archiveDir?: string
    /** Allow initialising inside an existing, non-empty directory. */
    force?: boolean
}

export interface InitReport {
    root: string
    created: string[]
    skipped: string[]
}

export function skillsDir(root: string): string {
    return path.join(root, '.claude', 'commands')
}

export async function hasSkills(fs: FileSystem, root: string): Promise<boolean> {
    const dir = skillsDir(root)
    return (await fs.exists(path.join(dir, 'til.md'))) && (await fs.exists(path.join(dir, 'note.md')))
}

async function isNonEmptyDir(fs: FileSystem, dir: string): Promise<boolean> {
    if (!(await fs.isDirectory(dir))) return false
    return (await fs.readDir(dir)).length > 0
}

export async function initTilRepo(fs: FileSystem, root: string, options: InitOptions = {}): Promise<InitReport> {
    const archiveDir = options.archiveDir ?? DEFAULT_ARCHIVE_DIR

    if ((await fs.exists(root)) && !(await fs.isDirectory(root))) {
        throw new ValidationError(`${root} exists and is not a directory`)
    }
    if (!options.force && (await isNonEmptyDir(fs, root))) {
        throw new ValidationError(`${root} is not empty. Use --force to add the TIL skeleton to it anyway.`)
    }

    const report: InitReport = { root, created: [], skipped: [] }
    const readmePath = path.join(root, 'README.md')
    const archivePath = path.join(root, archiveDir)
    const commandsPath = skillsDir(root)

    try {
        await fs.mkdir(root)

        if (await fs.exists(archivePath)) report.skipped.push(`${archiveDir}/`)
        else report.created.push(`${archiveDir}/`)
        await fs.mkdir(archivePath)
        await fs.mkdir(commandsPath)

        if (await fs.exists(readmePath)) {
            report.skipped.push('README.md')
        } else {
            await fs.writeText(readmePath, README_TEMPLATE)
            report.created.push('README.md')
        }

        await fs.writeText(path.join(commandsPath, 'til.md'), TIL_SKILL)
        await fs.writeText(path.join(commandsPath, 'note.md'), NOTE_SKILL)
        report.created.push('.claude/commands/til.md', '.claude/commands/note.md')
    } catch (error) {
        throw new IOFailureError(`Failed to initialise ${root}: ${errorMessage(error)}`, root, { cause: error })
    }

    return report
}
