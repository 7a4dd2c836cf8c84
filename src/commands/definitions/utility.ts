import { command } from '../builder.js'
import type { Command } from '../command.js'
import { optional, str, type ConverterClass } from '../converters.js'
import { BadArgument } from '../errors.js'
import type { CommandRegistry } from '../registry.js'
import type { CommandDefinition } from '../types.js'

const UNGROUPED = 'General'

function describeCommand(target: Command, prefix: string): string {
  const lines = [`${prefix}${target.usage}${target.description ? `: ${target.description}` : ''}`]
  if (target.aliases.length > 0) {
    lines.push(`Aliases: ${target.aliases.map((a) => `${prefix}${a}`).join(', ')}`)
  }
  if (target.isGroup) {
    lines.push(`Subcommands: ${target.subcommands.map((c) => c.name).join(', ')}`)
  }
  return lines.join('\n')
}

/**
 * !help [command...]
 * Lists all commands, or shows usage for a command or subcommand path.
 */
export function helpCommand(registry: CommandRegistry): CommandDefinition {
  return command('help')
    .alias('commands')
    .describe('Show available commands or help for a specific command')
    .rest('path', optional(str))
    .execute(async (ctx, { path }) => {
      const prefix = ctx.prefix ?? ''

      if (path) {
        const [head = '', ...tail] = path.split(/\s+/)
        let target = registry.get(head)
        for (const word of tail) target = target?.getSubcommand(word)
        if (!target) {
          await ctx.send(`Unknown command: ${path}`)
          return
        }
        await ctx.send(describeCommand(target, prefix))
        return
      }

      const grouped = new Map<string, string[]>()
      for (const cmd of registry.all()) {
        const heading = cmd.component?.name ?? UNGROUPED
        const list = grouped.get(heading) ?? []
        list.push(`${prefix}${cmd.name}`)
        grouped.set(heading, list)
      }

      const sections = [...grouped].map(([heading, names]) => `${heading}: ${names.join(', ')}`)
      await ctx.send(sections.join('\n'))
    })
}

/**
 * !ping
 * Simple health-check.
 */
export function pingCommand(): CommandDefinition {
  return command('ping')
    .describe('Health check, replies with pong')
    .execute(async (ctx) => {
      await ctx.send('pong')
    })
}

/**
 * !echo <text...>
 * Repeats the text exactly as typed.
 */
export function echoCommand(): CommandDefinition {
  return command('echo')
    .alias('say')
    .describe('Repeat a message')
    .rest('text', 'str')
    .execute(async (ctx, { text }) => {
      await ctx.send(text)
    })
}

/** Whole number within an inclusive range. */
export class IntRange implements ConverterClass<number> {
  constructor(
    readonly min: number,
    readonly max: number
  ) {}

  convert(_ctx: unknown, raw: string): number {
    const trimmed = raw.trim()
    if (!/^\d+$/.test(trimmed)) throw new BadArgument(`"${raw}" is not a whole number.`, raw)
    const value = Number(trimmed)
    if (value < this.min || value > this.max) {
      throw new BadArgument(`${value} must be between ${this.min} and ${this.max}.`, raw)
    }
    return value
  }
}

/**
 * !roll [sides]
 * Rolls a die with `sides` faces (6 by default).
 */
export function rollCommand(random: () => number = Math.random): CommandDefinition {
  return command('roll')
    .alias('dice')
    .describe('Roll a die')
    .param('sides', optional(new IntRange(2, 1000)), { default: 6 })
    .execute(async (ctx, { sides }) => {
      const faces = sides ?? 6
      const result = 1 + Math.floor(random() * faces)
      const who = ctx.message.senderName ?? ctx.message.senderId
      await ctx.send(`${who} rolled ${result} (d${faces})`)
    })
}
