import type { CommandContext } from './context.js'
import type { Cooldown, CooldownSpec } from './cooldowns.js'
import type { ConverterTypeMap, TypeName, TypeSpec } from './converters.js'
import type { GuardLike, GuardPredicate } from './guards.js'
import type {
  BoundArgs,
  CommandDefinition,
  ErrorHandler,
  InvokeHook,
  ParameterDefinition,
  ParameterKind
} from './types.js'

export interface ParamOptions<T> {
  default?: T
  /** Special parameters only. */
  delimiter?: string
}

type With<Args, N extends string, T> = Args & { [K in N]: T }

/**
 * Fluent, immutable builder for {@link CommandDefinition}s.
 *
 * Each parameter method widens the argument type the body receives:
 *
 * ```ts
 * const roll = command('roll')
 *   .param('sides', optional(int), { default: 6 })
 *   .execute(async (ctx, { sides }) => ctx.send(String(sides)))
 * ```
 */
export class CommandBuilder<Args extends BoundArgs = Record<never, never>> {
  constructor(private readonly definition: CommandDefinition) {}

  private with(patch: Partial<CommandDefinition>): CommandBuilder<Args> {
    return new CommandBuilder<Args>({ ...this.definition, ...patch })
  }

  private withParameter(
    kind: ParameterKind,
    name: string,
    type: TypeSpec<unknown> | TypeName,
    options: ParamOptions<unknown>
  ): CommandDefinition {
    const parameter: ParameterDefinition = {
      name,
      kind,
      type,
      hasDefault: 'default' in options,
      default: options.default,
      ...(options.delimiter !== undefined ? { delimiter: options.delimiter } : {})
    }
    return { ...this.definition, parameters: [...(this.definition.parameters ?? []), parameter] }
  }

  alias(...aliases: string[]): CommandBuilder<Args> {
    return this.with({ aliases: [...(this.definition.aliases ?? []), ...aliases] })
  }

  describe(description: string): CommandBuilder<Args> {
    return this.with({ description })
  }

  usage(usage: string): CommandBuilder<Args> {
    return this.with({ usage })
  }

  /** Default delimiter for special parameters declared without one. */
  delimiter(delimiter: string): CommandBuilder<Args> {
    return this.with({ delimiter })
  }

  /** Positional parameter: takes the next token. */
  param<N extends string, K extends TypeName>(
    name: N,
    type: K,
    options?: ParamOptions<ConverterTypeMap[K]>
  ): CommandBuilder<With<Args, N, ConverterTypeMap[K]>>
  param<N extends string, T>(name: N, type: TypeSpec<T>, options?: ParamOptions<T>): CommandBuilder<With<Args, N, T>>
  param(name: string, type: TypeSpec<unknown> | TypeName, options: ParamOptions<unknown> = {}): CommandBuilder<BoundArgs> {
    return new CommandBuilder<BoundArgs>(this.withParameter('positional', name, type, options))
  }

  /** Keyed parameter written `name=value` anywhere in the input. */
  special<N extends string, K extends TypeName>(
    name: N,
    type: K,
    options?: ParamOptions<ConverterTypeMap[K]>
  ): CommandBuilder<With<Args, N, ConverterTypeMap[K]>>
  special<N extends string, T>(name: N, type: TypeSpec<T>, options?: ParamOptions<T>): CommandBuilder<With<Args, N, T>>
  special(name: string, type: TypeSpec<unknown> | TypeName, options: ParamOptions<unknown> = {}): CommandBuilder<BoundArgs> {
    return new CommandBuilder<BoundArgs>(this.withParameter('special', name, type, options))
  }

  /** Consume-rest parameter: the remaining text, verbatim. Must come last. */
  rest<N extends string, K extends TypeName>(
    name: N,
    type: K,
    options?: ParamOptions<ConverterTypeMap[K]>
  ): CommandBuilder<With<Args, N, ConverterTypeMap[K]>>
  rest<N extends string, T>(name: N, type: TypeSpec<T>, options?: ParamOptions<T>): CommandBuilder<With<Args, N, T>>
  rest(name: string, type: TypeSpec<unknown> | TypeName, options: ParamOptions<unknown> = {}): CommandBuilder<BoundArgs> {
    return new CommandBuilder<BoundArgs>(this.withParameter('rest', name, type, options))
  }

  guard(...guards: GuardLike[]): CommandBuilder<Args> {
    return this.with({ guards: [...(this.definition.guards ?? []), ...guards] })
  }

  cooldown(...cooldowns: Array<CooldownSpec | Cooldown>): CommandBuilder<Args> {
    return this.with({ cooldowns: [...(this.definition.cooldowns ?? []), ...cooldowns] })
  }

  bypassCooldownWhen(predicate: GuardPredicate): CommandBuilder<Args> {
    return this.with({ cooldownBypass: predicate })
  }

  /** Surplus positional tokens become an `ArgumentParsingFailed`. */
  strict(): CommandBuilder<Args> {
    return this.with({ ignoreExtraArguments: false })
  }

  subcommand(...subcommands: CommandDefinition[]): CommandBuilder<Args> {
    return this.with({ subcommands: [...(this.definition.subcommands ?? []), ...subcommands] })
  }

  before(hook: InvokeHook): CommandBuilder<Args> {
    return this.with({ beforeInvoke: hook })
  }

  after(hook: InvokeHook): CommandBuilder<Args> {
    return this.with({ afterInvoke: hook })
  }

  onError(handler: ErrorHandler): CommandBuilder<Args> {
    return this.with({ onError: handler })
  }

  /** Finishes the definition with a body. */
  execute(body: (ctx: CommandContext, args: Args) => Promise<void>): CommandDefinition<Args> {
    return { ...this.definition, execute: body }
  }

  /** Finishes a body-less group definition. */
  build(): CommandDefinition {
    return { ...this.definition }
  }
}

export function command(name: string): CommandBuilder {
  return new CommandBuilder({ name })
}
