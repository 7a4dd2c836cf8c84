import type { InboundMessage, Logger } from '../core/types.js'
import { bindArguments } from './binder.js'
import { Invocation, isBound, type CommandContext } from './context.js'
import { CommandError, CommandHookError, CommandInvokeError, CommandNotFound, describeError } from './errors.js'
import { runGuards, toGuard, type Guard, type GuardLike } from './guards.js'
import type { CommandRegistry } from './registry.js'
import { tokenize } from './tokenizer.js'
import type { Awaitable, EntityResolver, InvokeHook, MessageSender } from './types.js'

export type PrefixResolver = (message: InboundMessage) => Awaitable<string | readonly string[]>

/** A prefix, a list tried in order, or a function of the message returning either. */
export type PrefixOption = string | readonly string[] | PrefixResolver

/**
 * Receives every failed invocation exactly once. What the chat sees is up to the reporter.
 */
export interface ErrorReporter {
  reportError(invocation: Invocation, error: CommandError): Awaitable<void>
}

export interface DispatcherOptions {
  registry: CommandRegistry
  prefix: PrefixOption
  sender: MessageSender
  resolver: EntityResolver
  logger: Logger
  /** Defaults to logging the failure. */
  reporter?: ErrorReporter
  /** Messages from this sender (the bot itself) are ignored. */
  selfId?: string
  ownerId?: string
  /** Longest chunk `ctx.send` hands to the sender (default 500). */
  maxMessageLength?: number
  /** Checked before every command's own guard chain. */
  guards?: GuardLike[]
  beforeInvoke?: InvokeHook
  afterInvoke?: InvokeHook
}

const DEFAULT_MAX_MESSAGE_LENGTH = 500

/**
 * Turns inbound chat messages into command invocations.
 *
 * Each call walks prefix match, lookup, tokenize, bind, guards, cooldowns and invoke,
 * stopping at the first stage that fails. Failures are reported, never thrown: one bad
 * invocation cannot disturb others running alongside it.
 */
export class Dispatcher {
  private readonly globalGuards: readonly Guard[]
  private readonly reporter: ErrorReporter

  constructor(private readonly options: DispatcherOptions) {
    this.globalGuards = (options.guards ?? []).map(toGuard)
    this.reporter = options.reporter ?? {
      reportError: (invocation, error) => {
        options.logger.warn('command.error', {
          command: invocation.command?.qualifiedName ?? invocation.invokedWith,
          error: error.name,
          message: error.message
        })
      }
    }
  }

  get registry(): CommandRegistry {
    return this.options.registry
  }

  /**
   * Dispatches one message. Resolves to `null` when the message is not a command
   * (no prefix, an empty name after it, or sent by the bot itself).
   */
  async dispatch(message: InboundMessage, signal: AbortSignal = new AbortController().signal): Promise<Invocation | null> {
    const { logger } = this.options
    if (this.options.selfId !== undefined && message.senderId === this.options.selfId) return null

    let prefix: string | undefined
    try {
      prefix = await this.matchPrefix(message)
    } catch (error) {
      logger.error('dispatch.prefix_failed', { chatId: message.chatId, error: describeError(error) })
      return null
    }
    if (prefix === undefined) return null

    const text = message.content.slice(prefix.length)
    if (!text || /^\s/.test(text)) return null

    const invocation = new Invocation(message, {
      sender: this.options.sender,
      resolver: this.options.resolver,
      ...(this.options.ownerId !== undefined ? { ownerId: this.options.ownerId } : {}),
      maxMessageLength: this.options.maxMessageLength ?? DEFAULT_MAX_MESSAGE_LENGTH,
      signal
    })
    invocation.prefix = prefix

    try {
      await this.run(invocation, text)
      invocation.outcome = { status: 'completed' }
      invocation.state = 'completed'
      logger.info('dispatch.completed', {
        command: invocation.command?.qualifiedName,
        senderId: message.senderId,
        chatId: message.chatId
      })
    } catch (error) {
      const state = invocation.state
      if (signal.aborted) {
        invocation.outcome = { status: 'cancelled', state }
        invocation.state = 'cancelled'
        logger.info('dispatch.cancelled', { command: invocation.command?.qualifiedName, state })
        return invocation
      }

      const failure = error instanceof CommandError ? error : new CommandInvokeError(error)
      invocation.outcome = { status: 'failed', error: failure, state }
      invocation.state = 'failed'
      logger.warn('dispatch.failed', {
        command: invocation.command?.qualifiedName ?? invocation.invokedWith,
        state,
        error: failure.name,
        message: failure.message
      })
      await this.report(invocation, failure)
    }

    return invocation
  }

  private async matchPrefix(message: InboundMessage): Promise<string | undefined> {
    const option = this.options.prefix
    const candidates = typeof option === 'function' ? await option(message) : option
    const list = typeof candidates === 'string' ? [candidates] : candidates
    return list.find((prefix) => prefix.length > 0 && message.content.startsWith(prefix))
  }

  private async run(invocation: Invocation, text: string): Promise<void> {
    invocation.state = 'lookup'
    const resolution = this.options.registry.resolve(text)
    invocation.invokedWith = resolution.invokedWith
    if (!resolution.found) throw resolution.error

    invocation.command = resolution.command
    invocation.remainder = resolution.remainder
    if (resolution.subcommandTrigger !== undefined) invocation.subcommandTrigger = resolution.subcommandTrigger
    if (!isBound(invocation)) throw new CommandNotFound(resolution.invokedWith)
    const ctx = invocation
    const { command } = ctx

    ctx.state = 'tokenize'
    ctx.tokens = tokenize(ctx.remainder, command.tokenizerOptions)

    ctx.state = 'bind'
    ctx.args = await bindArguments(ctx, command.parameters, ctx.tokens, {
      ignoreExtra: command.ignoreExtraArguments
    })
    ctx.signal.throwIfAborted()

    ctx.state = 'guard'
    await runGuards(ctx, [...this.globalGuards, ...command.guards])
    ctx.signal.throwIfAborted()

    ctx.state = 'cooldown'
    const bypass = command.cooldownBypass ? await command.cooldownBypass(ctx) : false
    ctx.signal.throwIfAborted()
    if (!bypass) await command.cooldowns.acquire(ctx)

    ctx.state = 'invoke'
    await this.invoke(ctx)
  }

  private hooks(ctx: CommandContext, phase: 'beforeInvoke' | 'afterInvoke'): InvokeHook[] {
    const { command } = ctx
    return [this.options[phase], command.component?.[phase], command[phase]].filter(
      (hook): hook is InvokeHook => hook !== undefined
    )
  }

  private async runHooks(ctx: CommandContext, phase: 'beforeInvoke' | 'afterInvoke'): Promise<void> {
    for (const hook of this.hooks(ctx, phase)) {
      try {
        await hook(ctx)
      } catch (error) {
        throw new CommandHookError(error)
      }
    }
  }

  /** Before-hooks, the body, then after-hooks, which run even when the body failed. */
  private async invoke(ctx: CommandContext): Promise<void> {
    await this.runHooks(ctx, 'beforeInvoke')

    let bodyError: unknown
    try {
      await ctx.command.invoke(ctx, ctx.args)
    } catch (error) {
      bodyError = error
    }

    try {
      await this.runHooks(ctx, 'afterInvoke')
    } catch (hookError) {
      if (bodyError === undefined) throw hookError
      this.options.logger.error('dispatch.after_hook_failed', {
        command: ctx.command.qualifiedName,
        error: describeError(hookError)
      })
    }

    if (bodyError !== undefined) throw bodyError
  }

  /** Command handler, then component handler, then the reporter. Nothing escapes. */
  private async report(invocation: Invocation, error: CommandError): Promise<void> {
    const { logger } = this.options
    const handlers = [invocation.command?.onError, invocation.command?.component?.onError]

    for (const handler of handlers) {
      if (!handler) continue
      try {
        await handler(invocation, error)
      } catch (handlerError) {
        logger.error('dispatch.error_handler_failed', {
          command: invocation.command?.qualifiedName,
          error: describeError(handlerError)
        })
      }
    }

    try {
      await this.reporter.reportError(invocation, error)
    } catch (reportError) {
      logger.error('dispatch.report_failed', {
        command: invocation.command?.qualifiedName ?? invocation.invokedWith,
        error: describeError(reportError)
      })
    }
  }
}
