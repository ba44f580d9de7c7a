import path from 'node:path'
import { parse, stringify } from 'smol-toml'
import { ConfigInvalidError, IOFailureError, ValidationError, errorMessage } from '../core/errors.js'
import type { FileSystem } from '../core/fs.js'
import type { Logger } from '../logger/index.js'
import { DEFAULT_ASSISTANT, configFilePath } from './defaults.js'
import {
    type AssistantSettings,
    ConfigFileSchema,
    type HolocronConfig,
    NOTES_FORMATS,
    type NotesFormat,
    fromConfigFile,
    toConfigFile,
} from './schema.js'

export class ConfigStore {
    readonly filePath: string

    constructor(
        private fs: FileSystem,
        private logger: Logger,
        filePath: string = configFilePath()
    ) {
        this.filePath = filePath
    }

    async exists(): Promise<boolean> {
        return this.fs.exists(this.filePath)
    }

    /** Returns null when no config file exists yet. */
    async load(): Promise<HolocronConfig | null> {
        if (!(await this.fs.exists(this.filePath))) return null

        let raw: unknown
        try {
            raw = parse(await this.fs.readText(this.filePath))
        } catch (error) {
            throw new ConfigInvalidError(`Failed to parse ${this.filePath}: ${errorMessage(error)}`, { cause: error })
        }

        const parsed = ConfigFileSchema.safeParse(raw)
        if (!parsed.success) {
            const issues = parsed.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`)
            throw new ConfigInvalidError(`Invalid config in ${this.filePath}: ${issues.join('; ')}`)
        }

        this.logger.debug({ path: this.filePath }, 'config:loaded')
        return fromConfigFile(parsed.data)
    }

    async save(config: HolocronConfig): Promise<void> {
        const parsed = ConfigFileSchema.safeParse(toConfigFile(config))
        if (!parsed.success) {
            const issues = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`)
            throw new ValidationError(`Invalid configuration: ${issues.join('; ')}`)
        }

        const tmpPath = `${this.filePath}.tmp`
        try {
            await this.fs.mkdir(path.dirname(this.filePath))
            await this.fs.writeText(tmpPath, stringify(parsed.data))
            await this.fs.rename(tmpPath, this.filePath)
        } catch (error) {
            throw new IOFailureError(`Failed to write ${this.filePath}: ${errorMessage(error)}`, this.filePath, {
                cause: error,
            })
        }
        this.logger.debug({ path: this.filePath }, 'config:saved')
    }
}

export function parseNotesFormat(value: string): NotesFormat {
    const normalized = value.trim().toLowerCase()
    const match = NOTES_FORMATS.find((f) => f === normalized)
    if (!match) {
        throw new ValidationError(`Invalid notes format "${value}". Use: ${NOTES_FORMATS.join(', ')}`)
    }
    return match
}

export function resolveAssistantSettings(
    config: HolocronConfig,
    env: NodeJS.ProcessEnv = process.env
): AssistantSettings {
    // Priority: env vars > config file > defaults
    const command = env.HOLOCRON_ASSISTANT_COMMAND || config.assistant?.command || DEFAULT_ASSISTANT.command

    let timeoutMs = config.assistant?.timeoutMs ?? DEFAULT_ASSISTANT.timeoutMs
    if (env.HOLOCRON_ASSISTANT_TIMEOUT_MS) {
        const fromEnv = Number(env.HOLOCRON_ASSISTANT_TIMEOUT_MS)
        if (!Number.isInteger(fromEnv) || fromEnv <= 0) {
            throw new ValidationError(
                `HOLOCRON_ASSISTANT_TIMEOUT_MS must be a positive integer, got "${env.HOLOCRON_ASSISTANT_TIMEOUT_MS}"`
            )
        }
        timeoutMs = fromEnv
    }

    return { command, timeoutMs }
}
