import type { CommandContext } from './context.js'
import { CheckFailure, CommandError } from './errors.js'
import type { Awaitable } from './types.js'

export type GuardPredicate = (ctx: CommandContext) => Awaitable<boolean>

/**
 * A named predicate that must hold before a command runs.
 * `message` becomes the `CheckFailure` message when the predicate returns false.
 */
export interface Guard {
  readonly name: string
  readonly message?: string
  check(ctx: CommandContext): Awaitable<boolean>
}

export type GuardLike = Guard | GuardPredicate

export function toGuard(guard: GuardLike): Guard {
  if (typeof guard !== 'function') return guard
  return { name: guard.name || 'anonymous guard', check: guard }
}

/** Builds a named guard. */
export function guard(name: string, check: GuardPredicate, message?: string): Guard {
  return message === undefined ? { name, check } : { name, check, message }
}

/**
 * Evaluates guards strictly in order, stopping at the first that fails.
 *
 * A guard may throw its own `CheckFailure` to supply a message; any other error is
 * wrapped in one that names the guard.
 */
export async function runGuards(ctx: CommandContext, guards: readonly Guard[]): Promise<void> {
  for (const current of guards) {
    let passed: boolean
    try {
      passed = await current.check(ctx)
    } catch (error) {
      if (error instanceof CommandError) throw error
      throw new CheckFailure(current.name, current.message, { cause: error })
    }
    if (!passed) throw new CheckFailure(current.name, current.message)
  }
}

/** Passes only for the configured bot owner. */
export function isOwner(): Guard {
  return guard('isOwner', (ctx) => ctx.isOwner, 'Only the bot owner can use this command.')
}

/** Passes for senders whose id is in `adminIds` (and for the owner). */
export function adminOnly(adminIds: readonly string[]): Guard {
  return guard(
    'adminOnly',
    (ctx) => ctx.isOwner || adminIds.includes(ctx.message.senderId),
    'You do not have permission to use this command.'
  )
}

/** Passes when the sender holds at least one of `roles` in this chat. */
export function hasRole(...roles: string[]): Guard {
  return guard(
    `hasRole(${roles.join(', ')})`,
    (ctx) => (ctx.message.roles ?? []).some((role) => roles.includes(role)),
    `This command requires one of the roles: ${roles.join(', ')}.`
  )
}

/** Restricts a command to the listed chats. */
export function inChat(...chatIds: string[]): Guard {
  return guard(`inChat(${chatIds.join(', ')})`, (ctx) => chatIds.includes(ctx.message.chatId))
}
