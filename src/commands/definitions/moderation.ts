import { command } from '../builder.js'
import type { CommandDefinition } from '../types.js'
import type { RuntimeSettings } from './config.js'

/** One shoutout per channel every 2 minutes, two back to back. */
export const SHOUTOUT_COOLDOWN = {
  bucket: 'channel',
  rate: 1,
  periodMs: 120_000,
  algorithm: 'gcra',
  burst: 2
} as const

/**
 * !shoutout <user>
 * Promotes another user in chat. The owner is never rate limited.
 */
export function shoutoutCommand(settings: RuntimeSettings): CommandDefinition {
  return command('shoutout')
    .alias('so')
    .describe('Give another user a shoutout')
    .param('target', 'user')
    .cooldown(SHOUTOUT_COOLDOWN)
    .bypassCooldownWhen((ctx) => ctx.isOwner)
    .execute(async (ctx, { target }) => {
      const template = settings.get('shoutoutTemplate') ?? '{name}'
      await ctx.send(template.replaceAll('{name}', target.name))
    })
}
