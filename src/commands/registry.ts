import type { Logger } from '../core/types.js'
import { Command, normalizeName, toComponent, type Component } from './command.js'
import type { Clock } from './cooldowns.js'
import { ConverterRegistry } from './converters.js'
import { CommandExistsError, CommandNotFound } from './errors.js'
import type { CommandDefinition, ComponentDefinition } from './types.js'

export interface CommandRegistryOptions {
  /** Name/alias matching ignores case (default true). */
  caseInsensitive?: boolean
  converters?: ConverterRegistry
  /** Clock handed to every command's cooldown manager. */
  clock?: Clock
  logger?: Logger
}

/** Result of resolving the text after a prefix. */
export type Resolution =
  | {
      found: true
      command: Command
      invokedWith: string
      /** Trigger of the innermost subcommand, when one matched. */
      subcommandTrigger?: string
      /** Text after the last consumed command name. */
      remainder: string
    }
  | { found: false; error: CommandNotFound; invokedWith: string }

interface Table {
  /** Every name and alias, normalized, to its command. */
  readonly lookup: ReadonlyMap<string, Command>
  /** Registration order. */
  readonly commands: readonly Command[]
  readonly components: ReadonlyMap<string, { component: Component; commands: readonly Command[] }>
}

/** Splits off the first whitespace-delimited word; the rest loses its leading whitespace. */
function splitWord(text: string): { word: string; rest: string } {
  const match = /^(\S*)\s*([\s\S]*)$/.exec(text)
  return { word: match?.[1] ?? '', rest: match?.[2] ?? '' }
}

/**
 * Central registry for all bot commands.
 *
 * Lookups go through an immutable table that every mutation replaces whole, so a
 * dispatch in flight sees either the old table or the new one, never a mix.
 */
export class CommandRegistry {
  readonly converters: ConverterRegistry
  private readonly caseInsensitive: boolean
  private readonly clock?: Clock
  private readonly logger?: Logger
  private table: Table = { lookup: new Map(), commands: [], components: new Map() }

  constructor(options: CommandRegistryOptions = {}) {
    this.caseInsensitive = options.caseInsensitive ?? true
    this.converters = options.converters ?? new ConverterRegistry()
    this.clock = options.clock
    this.logger = options.logger
  }

  private key(name: string): string {
    return normalizeName(name, this.caseInsensitive)
  }

  private build(definition: CommandDefinition, component?: Component): Command {
    return new Command(definition, {
      converters: this.converters,
      caseInsensitive: this.caseInsensitive,
      ...(component ? { component } : {}),
      ...(this.clock ? { clock: this.clock } : {})
    })
  }

  /** Copies `lookup` with the names of `commands` added; throws on any collision. */
  private withCommands(lookup: ReadonlyMap<string, Command>, commands: readonly Command[]): Map<string, Command> {
    const next = new Map(lookup)
    for (const command of commands) {
      for (const name of [command.name, ...command.aliases]) {
        const key = this.key(name)
        const existing = next.get(key)
        if (existing) throw new CommandExistsError(name, existing.name)
        next.set(key, command)
      }
    }
    return next
  }

  /**
   * Registers a command definition, indexing its name and aliases.
   * Throws `CommandExistsError` on a collision and leaves the registry unchanged.
   */
  register(definition: CommandDefinition): Command {
    const command = this.build(definition)
    const lookup = this.withCommands(this.table.lookup, [command])
    this.table = { ...this.table, lookup, commands: [...this.table.commands, command] }
    this.logger?.debug('registry.register', { command: command.name, aliases: command.aliases })
    return command
  }

  /** Registers every command of a component, or none of them. */
  addComponent(definition: ComponentDefinition): Command[] {
    if (this.table.components.has(definition.name)) {
      throw new CommandExistsError(definition.name, definition.name)
    }
    const component = toComponent(definition)
    const commands = definition.commands.map((def) => this.build(def, component))
    const lookup = this.withCommands(this.table.lookup, commands)
    const components = new Map(this.table.components)
    components.set(component.name, { component, commands })
    this.table = { lookup, commands: [...this.table.commands, ...commands], components }
    this.logger?.info('registry.component.add', { component: component.name, commands: commands.length })
    return commands
  }

  /** Removes a component and all of its commands at once. */
  removeComponent(name: string): Component | undefined {
    const entry = this.table.components.get(name)
    if (!entry) return undefined
    const components = new Map(this.table.components)
    components.delete(name)
    this.table = { ...this.retract(entry.commands), components }
    this.logger?.info('registry.component.remove', { component: name })
    return entry.component
  }

  /**
   * Removes a top-level command with all of its aliases at once.
   * Commands that belong to a component are removed with the component.
   */
  unregister(nameOrAlias: string): Command | undefined {
    const command = this.get(nameOrAlias)
    if (!command || command.component) return undefined
    this.table = { ...this.table, ...this.retract([command]) }
    this.logger?.debug('registry.unregister', { command: command.name })
    return command
  }

  private retract(commands: readonly Command[]): Pick<Table, 'lookup' | 'commands'> {
    const removed = new Set(commands)
    const lookup = new Map<string, Command>()
    for (const [key, command] of this.table.lookup) {
      if (!removed.has(command)) lookup.set(key, command)
    }
    return { lookup, commands: this.table.commands.filter((c) => !removed.has(c)) }
  }

  /** Looks up a top-level command by name or alias. */
  get(nameOrAlias: string): Command | undefined {
    return this.table.lookup.get(this.key(nameOrAlias))
  }

  /** Returns true when a name/alias maps to a registered command. */
  has(nameOrAlias: string): boolean {
    return this.table.lookup.has(this.key(nameOrAlias))
  }

  /** Returns all top-level commands in registration order. */
  all(): Command[] {
    return [...this.table.commands]
  }

  getComponent(name: string): Component | undefined {
    return this.table.components.get(name)?.component
  }

  components(): Component[] {
    return [...this.table.components.values()].map((entry) => entry.component)
  }

  /**
   * Resolves the text after a prefix to a command, descending into groups one word at a
   * time. A group whose next word names no subcommand is itself invoked when it has a
   * body; otherwise the lookup fails naming the group and the word.
   */
  resolve(text: string): Resolution {
    const { lookup } = this.table
    const first = splitWord(text)
    const invokedWith = first.word
    let command = lookup.get(this.key(invokedWith))
    if (!command) return { found: false, error: new CommandNotFound(invokedWith), invokedWith }

    let remainder = first.rest
    let subcommandTrigger: string | undefined
    while (command.isGroup) {
      const next = splitWord(remainder)
      const child: Command | undefined = next.word ? command.getSubcommand(next.word) : undefined
      if (child) {
        command = child
        subcommandTrigger = next.word
        remainder = next.rest
        continue
      }
      if (command.hasBody) break
      const missing = next.word ? `${command.qualifiedName} ${next.word}` : command.qualifiedName
      return { found: false, error: new CommandNotFound(missing), invokedWith }
    }

    return {
      found: true,
      command,
      invokedWith,
      ...(subcommandTrigger !== undefined ? { subcommandTrigger } : {}),
      remainder
    }
  }
}
