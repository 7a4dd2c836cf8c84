import { command } from '../builder.js'
import { optional, str, type ConverterFn } from '../converters.js'
import { BadArgument } from '../errors.js'
import type { GuardLike } from '../guards.js'
import type { CommandDefinition } from '../types.js'

/** Keys `config set` may change, with their starting values. */
export const DEFAULT_RUNTIME_SETTINGS = {
  shoutoutTemplate: 'Go check out {name}!',
  errorReplies: 'true'
} as const satisfies Record<string, string>

export type RuntimeSettingKey = keyof typeof DEFAULT_RUNTIME_SETTINGS

/**
 * Whitelisted, mutable runtime settings shared by the built-in commands.
 */
export class RuntimeSettings {
  private readonly values = new Map<string, string>()

  constructor(initial: Partial<Record<RuntimeSettingKey, string>> = {}) {
    for (const [key, value] of Object.entries({ ...DEFAULT_RUNTIME_SETTINGS, ...initial })) {
      this.values.set(key, value)
    }
  }

  has(key: string): boolean {
    return this.values.has(key)
  }

  get(key: string): string | undefined {
    return this.values.get(key)
  }

  /** Returns false when `key` is not whitelisted. */
  set(key: string, value: string): boolean {
    if (!this.values.has(key)) return false
    this.values.set(key, value)
    return true
  }

  entries(): Array<[string, string]> {
    return [...this.values]
  }
}

/** Converter for whitelisted setting keys. */
function settingKey(settings: RuntimeSettings): ConverterFn<string> {
  return function settingKey(_ctx: unknown, raw: string): string {
    if (!settings.has(raw)) throw new BadArgument(`Unknown configuration key: ${raw}`, raw)
    return raw
  }
}

/**
 * !config get [key]
 * Shows one runtime setting, or all of them.
 */
export function configGetCommand(settings: RuntimeSettings): CommandDefinition {
  return command('get')
    .alias('show')
    .describe('Show current configuration values')
    .param('key', optional(str))
    .execute(async (ctx, { key }) => {
      if (key) {
        const value = settings.get(key)
        await ctx.send(value === undefined ? `Unknown configuration key: ${key}` : `${key} = ${value}`)
        return
      }
      const lines = settings.entries().map(([k, v]) => `${k} = ${v}`)
      await ctx.send(lines.join('\n'))
    })
}

/**
 * !config set <key> <value...>
 * Sets a runtime setting.
 */
export function configSetCommand(settings: RuntimeSettings, ...guards: GuardLike[]): CommandDefinition {
  return command('set')
    .describe('Set a runtime configuration value')
    .param('key', settingKey(settings))
    .rest('value', 'str')
    .guard(...guards)
    .execute(async (ctx, { key, value }) => {
      settings.set(key, value)
      await ctx.send(`Configuration updated: ${key} = ${value}`)
    })
}

/**
 * !config <get|set> ...
 * Group routing to the get/set subcommands; `set` carries the given guards.
 */
export function configCommand(settings: RuntimeSettings, ...setGuards: GuardLike[]): CommandDefinition {
  return command('config')
    .alias('cfg')
    .describe('Read or change runtime settings')
    .subcommand(configGetCommand(settings), configSetCommand(settings, ...setGuards))
    .build()
}
