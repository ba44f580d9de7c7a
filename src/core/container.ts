import { ClaudeCliClient } from '../assistant/claude-cli.js'
import type { AssistantClient } from '../assistant/types.js'
import type { HolocronConfig } from '../config/schema.js'
import { ConfigStore, resolveAssistantSettings } from '../config/store.js'
import { ClackTerminal, type Terminal } from '../cli/terminal.js'
import type { Logger } from '../logger/index.js'
import { createLogger, resolveLogLevel } from '../logger/index.js'
import { Session } from '../session/session.js'
import { type FileSystem, NodeFileSystem } from './fs.js'

/** Process-wide services available before a config has been loaded. */
export interface Runtime {
    logger: Logger
    fs: FileSystem
    terminal: Terminal
    configStore: ConfigStore
    createAssistant(config: HolocronConfig): AssistantClient
}

/** Everything one interactive or one-shot run owns for its lifetime. */
export interface Container extends Omit<Runtime, 'createAssistant'> {
    config: HolocronConfig
    assistant: AssistantClient
    session: Session
}

export function createRuntime(options: { debug?: boolean } = {}): Runtime {
    const logger = createLogger(resolveLogLevel(options.debug ?? false))
    const fs = new NodeFileSystem()
    return {
        logger,
        fs,
        terminal: new ClackTerminal(),
        configStore: new ConfigStore(fs, logger),
        createAssistant: (config) => new ClaudeCliClient(resolveAssistantSettings(config), logger),
    }
}

export function createContainer(config: HolocronConfig, runtime: Runtime): Container {
    return {
        config,
        logger: runtime.logger,
        fs: runtime.fs,
        terminal: runtime.terminal,
        configStore: runtime.configStore,
        assistant: runtime.createAssistant(config),
        session: new Session(),
    }
}
