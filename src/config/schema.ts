import { z } from 'zod'

export const NOTES_FORMATS = ['obsidian', 'logseq', 'plain'] as const

export type NotesFormat = (typeof NOTES_FORMATS)[number]

export const ConfigFileSchema = z.object({
    til_path: z.string().min(1, 'til_path must not be empty'),
    archive_dir: z.string().min(1).default('archive'),
    notes_path: z.string().min(1).optional(),
    notes_format: z.enum(NOTES_FORMATS).default('obsidian'),
    assistant: z
        .object({
            command: z.string().min(1).optional(),
            timeout_ms: z.number().int().positive().optional(),
        })
        .optional(),
})

export type ConfigFile = z.infer<typeof ConfigFileSchema>

export interface AssistantConfig {
    command?: string
    timeoutMs?: number
}

export interface HolocronConfig {
    tilPath: string
    archiveDir: string
    notesPath?: string
    notesFormat: NotesFormat
    assistant?: AssistantConfig
}

export interface AssistantSettings {
    command: string
    timeoutMs: number
}

export function fromConfigFile(file: ConfigFile): HolocronConfig {
    const config: HolocronConfig = {
        tilPath: file.til_path,
        archiveDir: file.archive_dir,
        notesFormat: file.notes_format,
    }
    if (file.notes_path !== undefined) config.notesPath = file.notes_path
    if (file.assistant && (file.assistant.command !== undefined || file.assistant.timeout_ms !== undefined)) {
        config.assistant = {}
        if (file.assistant.command !== undefined) config.assistant.command = file.assistant.command
        if (file.assistant.timeout_ms !== undefined) config.assistant.timeoutMs = file.assistant.timeout_ms
    }
    return config
}

export function toConfigFile(config: HolocronConfig): ConfigFile {
    const file: ConfigFile = {
        til_path: config.tilPath,
        archive_dir: config.archiveDir,
        notes_format: config.notesFormat,
    }
    if (config.notesPath !== undefined) file.notes_path = config.notesPath
    if (config.assistant && (config.assistant.command !== undefined || config.assistant.timeoutMs !== undefined)) {
        file.assistant = {}
        if (config.assistant.command !== undefined) file.assistant.command = config.assistant.command
        if (config.assistant.timeoutMs !== undefined) file.assistant.timeout_ms = config.assistant.timeoutMs
    }
    return file
}
