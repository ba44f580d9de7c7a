import path from 'node:path'
import type { Runtime } from '../../core/container.js'
import { expandHome } from '../../core/paths.js'
import { type InitOptions, initTilRepo } from '../../til-repo/init.js'
import { colors } from '../ui.js'

export async function initCommand(runtime: Runtime, target: string, options: InitOptions = {}): Promise<void> {
    const { fs, terminal, logger } = runtime
    const root = path.resolve(expandHome(target))

    const report = await initTilRepo(fs, root, options)
    logger.debug({ root, created: report.created.length }, 'til-repo:initialised')

    terminal.print(colors.success(`✓ TIL repository ready at ${colors.path(root)}`))
    for (const entry of report.created) terminal.print(`  ${colors.success('+')} ${entry}`)
    for (const entry of report.skipped) terminal.print(`  ${colors.dim(`= ${entry} (kept)`)}`)
    terminal.print('')
    terminal.print(`Point Holocron at it with: ${colors.command(`holocron config --til-path ${root}`)}`)
}
