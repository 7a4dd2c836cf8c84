import type { Logger } from '../core/types.js'
import type { Invocation } from './context.js'
import type { ErrorReporter } from './dispatcher.js'
import type { RuntimeSettings } from './definitions/config.js'
import {
  ArgumentParsingFailed,
  BadArgument,
  CheckFailure,
  CommandError,
  CommandInvokeError,
  CommandNotFound,
  CommandOnCooldown,
  CooldownKeyError,
  describeError,
  MissingRequiredArgument
} from './errors.js'

const GENERIC_FAILURE = 'Something went wrong while running that command.'

/**
 * Chat reply for a failed invocation, or `null` when the chat should see nothing.
 */
export function describeFailure(invocation: Invocation, error: CommandError): string | null {
  const usage = invocation.command ? ` Usage: ${invocation.prefix ?? ''}${invocation.command.usage}` : ''

  if (error instanceof CommandNotFound) return null
  if (error instanceof CommandOnCooldown) {
    return `That command is on cooldown. Try again in ${Math.max(error.retryAfter, 0.1).toFixed(1)}s.`
  }
  if (error instanceof CheckFailure) return error.message
  if (error instanceof MissingRequiredArgument) return `Missing argument: ${error.parameter}.${usage}`
  if (error instanceof BadArgument) return error.message
  if (error instanceof ArgumentParsingFailed) return `${error.message}.${usage}`
  if (error instanceof CommandInvokeError || error instanceof CooldownKeyError) return GENERIC_FAILURE
  return error.message
}

/**
 * Replies in chat with a short description of what went wrong.
 *
 * A crashed command body is logged at ERROR with the underlying cause. A cooldown key that
 * threw is logged at WARN; user errors only at DEBUG. Setting `errorReplies` to `false`
 * keeps the chat silent.
 */
export class ChatErrorReporter implements ErrorReporter {
  constructor(
    private readonly logger: Logger,
    private readonly settings?: RuntimeSettings
  ) {}

  async reportError(invocation: Invocation, error: CommandError): Promise<void> {
    const command = invocation.command?.qualifiedName ?? invocation.invokedWith

    if (error instanceof CommandInvokeError) {
      this.logger.error('command.crashed', {
        command,
        error: error.name,
        cause: error.original instanceof Error ? (error.original.stack ?? error.original.message) : String(error.original)
      })
    } else if (error instanceof CooldownKeyError) {
      this.logger.warn('command.cooldown_key_failed', { command, error: describeError(error.cause) })
    } else {
      this.logger.debug('command.rejected', { command, error: error.name, message: error.message })
    }

    if (this.settings?.get('errorReplies') === 'false') return
    const reply = describeFailure(invocation, error)
    if (reply) await invocation.send(reply)
  }
}
