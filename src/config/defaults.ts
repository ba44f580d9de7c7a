import os from 'node:os'
import path from 'node:path'
import type { AssistantSettings, HolocronConfig, NotesFormat } from './schema.js'

export const DEFAULT_ARCHIVE_DIR = 'archive'
export const DEFAULT_NOTES_FORMAT: NotesFormat = 'obsidian'

export const DEFAULT_ASSISTANT: AssistantSettings = {
    command: 'claude',
    timeoutMs: 300_000,
}

/** Characters of transcript handed to the generators before the oldest exchanges are dropped. */
export const CONTEXT_CHAR_BUDGET = 12_000

export const CATEGORY_PRESETS = ['git', 'rust', 'sql', 'postgres', 'python', 'javascript', 'typescript']

export function configDir(env: NodeJS.ProcessEnv = process.env): string {
    const base = env.XDG_CONFIG_HOME || path.join(os.homedir(), '.config')
    return path.join(base, 'holocron')
}

export function configFilePath(env: NodeJS.ProcessEnv = process.env): string {
    return env.HOLOCRON_CONFIG || path.join(configDir(env), 'config.toml')
}

export function defaultConfig(tilPath: string): HolocronConfig {
    return {
        tilPath,
        archiveDir: DEFAULT_ARCHIVE_DIR,
        notesFormat: DEFAULT_NOTES_FORMAT,
    }
}
