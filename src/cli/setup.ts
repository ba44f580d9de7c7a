import path from 'node:path'
import { defaultConfig } from '../config/defaults.js'
import type { HolocronConfig } from '../config/schema.js'
import type { Runtime } from '../core/container.js'
import { ConfigMissingError } from '../core/errors.js'
import { expandHome } from '../core/paths.js'
import { hasSkills, initTilRepo } from '../til-repo/init.js'
import { askNotesFormat } from './prompts.js'
import { colors } from './ui.js'

const notEmpty = (value: string) => (value.trim() ? undefined : 'A path is required')

/** Asks for a TIL repository and makes sure it has the archive and assistant skills. */
async function setupTilRepo(runtime: Runtime): Promise<string | null> {
    const { terminal, fs } = runtime
    const answer = await terminal.text('Where is your TIL repository?', {
        placeholder: '~/code/til',
        validate: notEmpty,
    })
    if (answer === null) return null
    const tilPath = path.resolve(expandHome(answer.trim()))

    if (!(await fs.exists(tilPath))) {
        const create = await terminal.confirm(`${tilPath} does not exist. Create a TIL repository there?`)
        if (create === null) return null
        if (create) {
            const report = await initTilRepo(fs, tilPath)
            terminal.print(colors.success(`Created ${report.created.join(', ')}`))
        }
        return tilPath
    }

    if (!(await hasSkills(fs, tilPath))) {
        const install = await terminal.confirm('Install the /til and /note assistant skills into it?')
        if (install === null) return null
        if (install) {
            await initTilRepo(fs, tilPath, { force: true })
            terminal.print(colors.success('Skills installed.'))
        }
    }
    return tilPath
}

/**
 * Walks the user through the first configuration and saves it. Returns null
 * when the user cancels.
 */
export async function runSetup(runtime: Runtime): Promise<HolocronConfig | null> {
    const { terminal, configStore } = runtime
    terminal.print(colors.brand("Welcome to Holocron! Let's get you set up."))

    const tilPath = await setupTilRepo(runtime)
    if (!tilPath) return null
    const config = defaultConfig(tilPath)

    const notes = await terminal.text('Where should detailed notes go? (leave empty to skip)', {
        placeholder: '~/notes',
        defaultValue: '',
    })
    if (notes === null) return null
    if (notes.trim()) {
        config.notesPath = path.resolve(expandHome(notes.trim()))
        const format = await askNotesFormat(terminal, config.notesFormat)
        if (format === null) return null
        config.notesFormat = format
    }

    await configStore.save(config)
    terminal.print(colors.success(`Configuration saved to ${configStore.filePath}`))
    return config
}

/** Loads the config, running the first-run setup when there is none. */
export async function ensureConfig(runtime: Runtime): Promise<HolocronConfig | null> {
    const existing = await runtime.configStore.load()
    if (existing) return existing
    if (!runtime.terminal.interactive) throw new ConfigMissingError()
    return runSetup(runtime)
}
