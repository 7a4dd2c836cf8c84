import type { InboundMessage } from '../core/types.js'
import type { CommandContext, Invocation } from './context.js'
import type { Cooldown, CooldownSpec } from './cooldowns.js'
import type { CommandError } from './errors.js'
import type { GuardLike, GuardPredicate } from './guards.js'
import type { TypeName, TypeSpec } from './converters.js'

export type Awaitable<T> = T | Promise<T>

/** Bound arguments keyed by parameter name. */
export type BoundArgs = Record<string, unknown>

/**
 * How a parameter takes its value from the message.
 *
 * - `positional`: the next unclaimed token
 * - `special`: a `key<delimiter>value` token anywhere in the input
 * - `rest`: the remaining raw text, verbatim
 */
export type ParameterKind = 'positional' | 'special' | 'rest'

/**
 * Declared parameter, as produced by the builder.
 * The `type` is mapped to a converter when the command is registered.
 */
export interface ParameterDefinition {
  name: string
  kind: ParameterKind
  type: TypeSpec<unknown> | TypeName
  /** Only consulted when `hasDefault` is true. */
  default?: unknown
  hasDefault: boolean
  /** Special parameters only. Falls back to the command delimiter, then `=`. */
  delimiter?: string
}

export type InvokeHook = (ctx: CommandContext) => Awaitable<void>

/** Called with the failed invocation before the global error reporter. */
export type ErrorHandler = (invocation: Invocation, error: CommandError) => Awaitable<void>

/**
 * Definition of a single bot command (or a group, when it has subcommands).
 *
 * Definitions are plain data; {@link CommandRegistry.register} resolves them into
 * {@link Command} instances.
 */
export interface CommandDefinition<Args extends BoundArgs = BoundArgs> {
  /** Primary command name (e.g. "help"). */
  name: string
  /** Alternative names that also trigger this command. */
  aliases?: string[]
  /** One-line description shown in help listings. */
  description?: string
  /** Longer usage string; derived from the parameters when omitted. */
  usage?: string
  parameters?: ParameterDefinition[]
  /** Default delimiter for this command's special parameters. */
  delimiter?: string
  guards?: GuardLike[]
  /** A {@link Cooldown} instance may be shared by several commands. */
  cooldowns?: Array<CooldownSpec | Cooldown>
  /** When true for an invocation, cooldowns are neither checked nor charged. */
  cooldownBypass?: GuardPredicate
  /** Surplus positional tokens are ignored unless this is `false`. */
  ignoreExtraArguments?: boolean
  subcommands?: CommandDefinition[]
  beforeInvoke?: InvokeHook
  afterInvoke?: InvokeHook
  onError?: ErrorHandler
  /** Command body. Groups without a body only route to subcommands. */
  execute?(ctx: CommandContext, args: Args): Promise<void>
}

/**
 * Named bundle of commands sharing guards, hooks and an error handler.
 */
export interface ComponentDefinition {
  name: string
  description?: string
  guards?: GuardLike[]
  beforeInvoke?: InvokeHook
  afterInvoke?: InvokeHook
  onError?: ErrorHandler
  commands: CommandDefinition[]
}

export type EntityKind = 'user' | 'channel' | 'clip'

/** Opaque platform entity returned by the resolver. */
export interface Entity {
  kind: EntityKind
  id: string
  name: string
  data?: Record<string, unknown>
}

/**
 * Looks up platform entities for converters. `undefined` means not found.
 */
export interface EntityResolver {
  resolveEntity(ctx: CommandContext, kind: EntityKind, raw: string): Promise<Entity | undefined>
}

/** Delivers one chunk of reply text to the chat the message came from. */
export type MessageSender = (message: InboundMessage, text: string) => Promise<void>
