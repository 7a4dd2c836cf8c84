#!/usr/bin/env node
import { CliChannel } from './channels/cli.js'
import { ChannelManager } from './channels/manager.js'
import { setupCommands } from './commands/setup.js'
import { loadConfig } from './config/load.js'
import { configSchema } from './config/schema.js'
import { getSettingsPath, settingsExist, writeSettings } from './config/settings.js'
import { MessageBus } from './core/bus.js'
import { CommandLoop } from './core/command-loop.js'
import { InMemoryDirectory, loadDirectory } from './core/directory.js'
import { createLogger, logger as bootLogger } from './core/logger.js'

/** `chatcmd init`: writes a settings file holding every default. */
function init(): void {
  if (settingsExist()) {
    bootLogger.warn('init.exists', { path: getSettingsPath() })
    return
  }
  writeSettings(configSchema.parse({}))
  bootLogger.info('init.written', { path: getSettingsPath() })
}

/** Boots the chatcmd runtime and starts the channel and command loops. */
async function main(): Promise<void> {
  if (process.argv[2] === 'init') {
    init()
    return
  }

  const config = loadConfig()
  const logger = createLogger({ level: config.logLevel })
  const bus = new MessageBus()

  const directory = config.directoryPath ? await loadDirectory(config.directoryPath) : new InMemoryDirectory()

  logger.info('startup.config', {
    prefixes: config.prefixes,
    caseInsensitive: config.caseInsensitive,
    entities: directory.size
  })

  const { registry, dispatcher } = setupCommands({
    config,
    logger: createLogger({ level: config.logLevel, scope: 'commands' }),
    resolver: directory,
    sender: (message, text) =>
      bus.publishOutbound({ channel: message.channel, chatId: message.chatId, content: text })
  })
  logger.info('startup.commands', { commands: registry.all().map((c) => c.name) })

  const channels = new ChannelManager(
    [new CliChannel(config.channels.cli, bus, createLogger({ level: config.logLevel, scope: 'cli' }))],
    bus,
    logger
  )
  const loop = new CommandLoop(bus, dispatcher, logger)

  const shutdown = async (signal: string): Promise<void> => {
    logger.info('shutdown.signal', { signal })
    await loop.stop()
    bus.close()
    await channels.stopAll()
  }

  process.on('SIGINT', () => {
    void shutdown('SIGINT')
  })
  process.on('SIGTERM', () => {
    void shutdown('SIGTERM')
  })

  await channels.startAll()
  await loop.start()
}

main().catch((error: unknown) => {
  bootLogger.error('fatal', {
    error: error instanceof Error ? error.message : String(error)
  })
  process.exitCode = 1
})
