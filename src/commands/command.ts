import type { CommandContext } from './context.js'
import { Cooldown, CooldownManager, createCooldown, type Clock } from './cooldowns.js'
import { CommandExistsError, CommandInvokeError, InvalidParameterError } from './errors.js'
import { toGuard, type Guard, type GuardPredicate } from './guards.js'
import type { Converter, ConverterRegistry } from './converters.js'
import type { TokenizerOptions } from './tokenizer.js'
import type {
  BoundArgs,
  CommandDefinition,
  ComponentDefinition,
  ErrorHandler,
  InvokeHook,
  ParameterKind
} from './types.js'

export const DEFAULT_DELIMITER = '='

/** Parameter with its declared type mapped to a converter. */
export interface Parameter {
  readonly name: string
  readonly kind: ParameterKind
  readonly converter: Converter<unknown>
  readonly hasDefault: boolean
  readonly default: unknown
  readonly delimiter: string
  /** True when the parameter may be left unbound. */
  readonly optional: boolean
}

/** Registered component: its commands share guards, hooks and an error handler. */
export interface Component {
  readonly name: string
  readonly description?: string
  readonly guards: readonly Guard[]
  readonly beforeInvoke?: InvokeHook
  readonly afterInvoke?: InvokeHook
  readonly onError?: ErrorHandler
}

export interface ResolveScope {
  converters: ConverterRegistry
  caseInsensitive: boolean
  component?: Component
  parent?: Command
  clock?: Clock
}

export function normalizeName(name: string, caseInsensitive: boolean): string {
  return caseInsensitive ? name.toLowerCase() : name
}

export function toComponent(definition: ComponentDefinition): Component {
  return {
    name: definition.name,
    ...(definition.description !== undefined ? { description: definition.description } : {}),
    guards: (definition.guards ?? []).map(toGuard),
    ...(definition.beforeInvoke ? { beforeInvoke: definition.beforeInvoke } : {}),
    ...(definition.afterInvoke ? { afterInvoke: definition.afterInvoke } : {}),
    ...(definition.onError ? { onError: definition.onError } : {})
  }
}

function validateName(name: string, kind: string): void {
  if (!name || /\s/.test(name)) {
    throw new TypeError(`${kind} "${name}" must be non-empty and contain no whitespace.`)
  }
}

function resolveParameters(definition: CommandDefinition, converters: ConverterRegistry): Parameter[] {
  const declared = definition.parameters ?? []
  const seen = new Set<string>()
  const parameters: Parameter[] = []
  let sawSpecialRun = false
  let specialRunClosed = false

  declared.forEach((param, index) => {
    const fail = (reason: string): never => {
      throw new InvalidParameterError(definition.name, param.name, reason)
    }

    if (!param.name) fail('parameter names must be non-empty')
    if (seen.has(param.name)) fail('parameter names must be unique')
    seen.add(param.name)

    if (param.kind === 'rest' && index !== declared.length - 1) {
      fail('a consume-rest parameter must be the last parameter')
    }
    if (param.kind === 'special') {
      if (specialRunClosed) fail('special parameters must be declared contiguously')
      sawSpecialRun = true
    } else if (sawSpecialRun && param.kind !== 'rest') {
      specialRunClosed = true
    }

    const delimiter = param.delimiter ?? definition.delimiter ?? DEFAULT_DELIMITER
    if (param.kind === 'special' && (delimiter.length !== 1 || /\s/.test(delimiter))) {
      fail('the delimiter must be exactly one non-whitespace character')
    }

    let converter: Converter<unknown>
    try {
      converter = converters.resolve(param.type)
    } catch (error) {
      throw new InvalidParameterError(
        definition.name,
        param.name,
        error instanceof Error ? error.message : String(error)
      )
    }

    parameters.push({
      name: param.name,
      kind: param.kind,
      converter,
      hasDefault: param.hasDefault,
      default: param.default,
      delimiter,
      optional: param.hasDefault || converter.optional
    })
  })

  return parameters
}

function resolveCooldowns(definition: CommandDefinition): Cooldown[] {
  return (definition.cooldowns ?? []).map((entry) => (entry instanceof Cooldown ? entry : createCooldown(entry)))
}

/**
 * A registered command: parameters resolved to converters, guard chain flattened.
 *
 * Instances are immutable; registries publish and retract them whole.
 */
export class Command {
  readonly name: string
  readonly aliases: readonly string[]
  readonly description: string
  readonly parameters: readonly Parameter[]
  /** Component guards, then ancestor group guards, then this command's own guards. */
  readonly guards: readonly Guard[]
  readonly cooldowns: CooldownManager
  readonly cooldownBypass?: GuardPredicate
  readonly ignoreExtraArguments: boolean
  readonly component?: Component
  readonly parent?: Command
  readonly beforeInvoke?: InvokeHook
  readonly afterInvoke?: InvokeHook
  readonly onError?: ErrorHandler
  readonly tokenizerOptions: TokenizerOptions
  private readonly explicitUsage?: string
  private readonly body?: CommandDefinition['execute']
  private readonly caseInsensitive: boolean
  private readonly children = new Map<string, Command>()
  private readonly childList: Command[] = []

  constructor(definition: CommandDefinition, scope: ResolveScope) {
    validateName(definition.name, 'Command name')
    for (const alias of definition.aliases ?? []) validateName(alias, 'Alias')

    this.name = definition.name
    this.aliases = [...(definition.aliases ?? [])]
    this.description = definition.description ?? ''
    this.explicitUsage = definition.usage
    this.parameters = resolveParameters(definition, scope.converters)
    this.component = scope.component
    this.parent = scope.parent
    this.caseInsensitive = scope.caseInsensitive

    const inherited = scope.parent ? scope.parent.guards : (scope.component?.guards ?? [])
    this.guards = [...inherited, ...(definition.guards ?? []).map(toGuard)]

    this.cooldowns = new CooldownManager(this.qualifiedName, resolveCooldowns(definition), scope.clock)
    this.cooldownBypass = definition.cooldownBypass
    this.ignoreExtraArguments = definition.ignoreExtraArguments ?? true
    this.beforeInvoke = definition.beforeInvoke
    this.afterInvoke = definition.afterInvoke
    this.onError = definition.onError
    this.body = definition.execute

    const specials = new Map<string, string>()
    for (const param of this.parameters) {
      if (param.kind === 'special') specials.set(param.name, param.delimiter)
    }
    this.tokenizerOptions = {
      specials,
      positionalCount: this.parameters.filter((p) => p.kind === 'positional').length,
      consumeRest: this.parameters.some((p) => p.kind === 'rest')
    }

    for (const sub of definition.subcommands ?? []) {
      this.addChild(new Command(sub, { ...scope, parent: this }))
    }
  }

  private addChild(child: Command): void {
    const keys = [child.name, ...child.aliases].map((n) => normalizeName(n, this.caseInsensitive))
    for (const [i, key] of keys.entries()) {
      const existing = this.children.get(key)
      if (existing || keys.indexOf(key) !== i) {
        throw new CommandExistsError(`${this.qualifiedName} ${key}`, existing?.qualifiedName ?? child.qualifiedName)
      }
    }
    for (const key of keys) this.children.set(key, child)
    this.childList.push(child)
  }

  /** Space-separated path from the top-level group, e.g. "config set". */
  get qualifiedName(): string {
    return this.parent ? `${this.parent.qualifiedName} ${this.name}` : this.name
  }

  get isGroup(): boolean {
    return this.childList.length > 0
  }

  get hasBody(): boolean {
    return this.body !== undefined
  }

  get subcommands(): readonly Command[] {
    return this.childList
  }

  getSubcommand(nameOrAlias: string): Command | undefined {
    return this.children.get(normalizeName(nameOrAlias, this.caseInsensitive))
  }

  /** Usage line derived from the parameters unless one was given. */
  get usage(): string {
    if (this.explicitUsage !== undefined) return this.explicitUsage
    const parts = this.parameters.map((p) => {
      if (p.kind === 'special') return p.optional ? `[${p.name}${p.delimiter}…]` : `${p.name}${p.delimiter}<…>`
      const label = p.kind === 'rest' ? `${p.name}...` : p.name
      return p.optional ? `[${label}]` : `<${label}>`
    })
    return [this.qualifiedName, ...parts].join(' ')
  }

  /** Runs the body. Anything it throws is wrapped in `CommandInvokeError`. */
  async invoke(ctx: CommandContext, args: BoundArgs): Promise<void> {
    if (!this.body) return
    try {
      await this.body(ctx, args)
    } catch (error) {
      throw new CommandInvokeError(error)
    }
  }

  toString(): string {
    return this.qualifiedName
  }
}
