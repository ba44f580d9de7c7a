import path from 'node:path'
import { defaultConfig } from '../../config/defaults.js'
import type { HolocronConfig } from '../../config/schema.js'
import { parseNotesFormat, resolveAssistantSettings } from '../../config/store.js'
import type { Runtime } from '../../core/container.js'
import { ConfigMissingError, ValidationError } from '../../core/errors.js'
import { expandHome } from '../../core/paths.js'
import { runSetup } from '../setup.js'
import { colors } from '../ui.js'

export interface ConfigFlags {
    tilPath?: string
    notesPath?: string
    notesFormat?: string
    archiveDir?: string
}

function resolvePath(value: string): string {
    return path.resolve(expandHome(value.trim()))
}

export function formatConfig(config: HolocronConfig, filePath: string, env: NodeJS.ProcessEnv = process.env): string {
    const assistant = resolveAssistantSettings(config, env)
    const row = (label: string, value: string) => `  ${colors.dim(label.padEnd(14))}${value}`
    return [
        colors.bold('Current Configuration'),
        row('TIL path', config.tilPath),
        row('Archive dir', config.archiveDir),
        row('Notes path', config.notesPath ?? colors.dim('(not set)')),
        row('Notes format', config.notesFormat),
        row('Assistant', `${assistant.command} (timeout ${Math.round(assistant.timeoutMs / 1000)}s)`),
        '',
        `${colors.dim('Config file:')} ${filePath}`,
    ].join('\n')
}

/** Applies the given flags on top of `base`. Unset flags leave values untouched. */
export function applyConfigFlags(base: HolocronConfig, flags: ConfigFlags): HolocronConfig {
    const next: HolocronConfig = { ...base }
    if (flags.tilPath !== undefined) {
        if (!flags.tilPath.trim()) throw new ValidationError('TIL path cannot be empty')
        next.tilPath = resolvePath(flags.tilPath)
    }
    if (flags.archiveDir !== undefined) {
        const archiveDir = flags.archiveDir.trim()
        if (!archiveDir) throw new ValidationError('Archive directory cannot be empty')
        next.archiveDir = archiveDir
    }
    if (flags.notesPath !== undefined) next.notesPath = resolvePath(flags.notesPath)
    if (flags.notesFormat !== undefined) next.notesFormat = parseNotesFormat(flags.notesFormat)
    return next
}

function hasFlags(flags: ConfigFlags): boolean {
    return Object.values(flags).some((value) => value !== undefined)
}

export async function configCommand(runtime: Runtime, flags: ConfigFlags): Promise<void> {
    const { configStore, terminal, logger } = runtime

    if (!hasFlags(flags)) {
        let config = await configStore.load()
        if (!config) {
            if (!terminal.interactive) throw new ConfigMissingError()
            config = await runSetup(runtime)
            if (!config) {
                terminal.print(colors.warn('Setup cancelled.'))
                return
            }
        }
        terminal.print(formatConfig(config, configStore.filePath))
        return
    }

    const existing = await configStore.load()
    if (!existing && flags.tilPath === undefined) {
        throw new ValidationError('No configuration exists yet. Pass --til-path to create one.')
    }
    const updated = applyConfigFlags(existing ?? defaultConfig(''), flags)

    await configStore.save(updated)
    logger.debug({ path: configStore.filePath }, 'config:updated')
    terminal.print(colors.success('✓ Configuration updated'))
    terminal.print(formatConfig(updated, configStore.filePath))
}
