import pino from 'pino'

export type Logger = pino.Logger

export type LogLevel = 'silent' | 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace'

const LEVELS: readonly LogLevel[] = ['silent', 'fatal', 'error', 'warn', 'info', 'debug', 'trace']

export function resolveLogLevel(debugFlag: boolean, env: NodeJS.ProcessEnv = process.env): LogLevel {
    if (debugFlag) return 'debug'
    const fromEnv = env.HOLOCRON_LOG_LEVEL?.toLowerCase()
    return LEVELS.find((l) => l === fromEnv) ?? 'warn'
}

export function createLogger(level: LogLevel): Logger {
    if (level === 'debug' || level === 'trace') {
        return pino({
            name: 'holocron',
            level,
            transport: { target: 'pino-pretty', options: { colorize: true, destination: 2 } },
        })
    }
    return pino({ name: 'holocron', level }, pino.destination(2))
}
