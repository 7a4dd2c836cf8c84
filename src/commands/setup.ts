import type { ChatCmdConfig } from '../config/schema.js'
import type { Logger } from '../core/types.js'
import type { Clock } from './cooldowns.js'
import { configCommand, RuntimeSettings } from './definitions/config.js'
import { shoutoutCommand } from './definitions/moderation.js'
import { echoCommand, helpCommand, pingCommand, rollCommand } from './definitions/utility.js'
import { Dispatcher, type ErrorReporter, type PrefixOption } from './dispatcher.js'
import { adminOnly } from './guards.js'
import { CommandRegistry } from './registry.js'
import { ChatErrorReporter } from './reporting.js'
import type { CommandDefinition, EntityResolver, MessageSender } from './types.js'

/**
 * Dependencies required by built-in commands.
 */
export interface CommandDependencies {
  config: ChatCmdConfig
  logger: Logger
  sender: MessageSender
  resolver: EntityResolver
}

/**
 * Options for the command setup.
 */
export interface SetupCommandsOptions {
  /** Additional custom commands to register alongside built-ins. */
  customCommands?: CommandDefinition[]
  /** Overrides `config.prefixes`, e.g. with a per-chat resolver. */
  prefix?: PrefixOption
  reporter?: ErrorReporter
  settings?: RuntimeSettings
  random?: () => number
  clock?: Clock
}

/**
 * Registers all built-in commands and any custom commands, then returns a
 * ready-to-use {@link Dispatcher}.
 */
export function setupCommands(
  deps: CommandDependencies,
  options: SetupCommandsOptions = {}
): { registry: CommandRegistry; dispatcher: Dispatcher; settings: RuntimeSettings } {
  const { config, logger } = deps
  const settings = options.settings ?? new RuntimeSettings()
  const registry = new CommandRegistry({
    caseInsensitive: config.caseInsensitive,
    logger,
    ...(options.clock ? { clock: options.clock } : {})
  })
  const admin = adminOnly(config.adminIds)

  registry.addComponent({
    name: 'general',
    description: 'Everyday commands',
    commands: [
      pingCommand(),
      echoCommand(),
      rollCommand(options.random),
      configCommand(settings, admin),
      helpCommand(registry)
    ].map((definition) => withExtraArgumentPolicy(definition, config.ignoreExtraArguments))
  })

  registry.addComponent({
    name: 'moderation',
    description: 'Commands for channel admins',
    guards: [admin],
    commands: [shoutoutCommand(settings)].map((definition) =>
      withExtraArgumentPolicy(definition, config.ignoreExtraArguments)
    )
  })

  for (const definition of options.customCommands ?? []) {
    registry.register(definition)
  }

  const dispatcher = new Dispatcher({
    registry,
    prefix: options.prefix ?? config.prefixes,
    sender: deps.sender,
    resolver: deps.resolver,
    logger,
    reporter: options.reporter ?? new ChatErrorReporter(logger, settings),
    maxMessageLength: config.maxMessageLength,
    ...(config.selfId !== undefined ? { selfId: config.selfId } : {}),
    ...(config.ownerId !== undefined ? { ownerId: config.ownerId } : {})
  })

  return { registry, dispatcher, settings }
}

/** Applies the configured default unless the definition sets its own. */
function withExtraArgumentPolicy(definition: CommandDefinition, ignoreExtra: boolean): CommandDefinition {
  if (definition.ignoreExtraArguments !== undefined) return definition
  return {
    ...definition,
    ignoreExtraArguments: ignoreExtra,
    ...(definition.subcommands
      ? { subcommands: definition.subcommands.map((sub) => withExtraArgumentPolicy(sub, ignoreExtra)) }
      : {})
  }
}
