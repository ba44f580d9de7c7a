import pc from 'picocolors'

export const VERSION = '0.1.0'

export const colors = {
    brand: (text: string) => pc.cyan(pc.bold(text)),
    success: (text: string) => pc.green(text),
    error: (text: string) => pc.red(text),
    warn: (text: string) => pc.yellow(text),
    dim: (text: string) => pc.dim(text),
    bold: (text: string) => pc.bold(text),
    command: (text: string) => pc.green(text),
    path: (text: string) => pc.underline(text),
}

const RULE_WIDTH = 60

export function rule(char = '═'): string {
    return colors.brand(char.repeat(RULE_WIDTH))
}

export function banner(title = 'HOLOCRON - Your Learning Assistant'): string {
    return [rule(), colors.brand(`  ${title}  `) + colors.dim(` v${VERSION}`), rule()].join('\n')
}

export function formatError(message: string): string {
    return `${colors.error('Error:')} ${message}`
}

export function formatSaved(kind: 'til' | 'note', filePath: string): string {
    const label = kind === 'til' ? 'TIL saved to:' : 'Note saved to:'
    return `${colors.success(`✓ ${label}`)} ${colors.path(filePath)}`
}
