import { describe, expect, it } from 'vitest'

import { command, CommandRegistry, int, optional } from '../src/commands/index.js'

describe('CommandBuilder', () => {
  it('produces a plain definition', () => {
    const definition = command('roll')
      .alias('dice')
      .describe('Roll a die')
      .param('sides', optional(int), { default: 6 })
      .special('times', 'int', { delimiter: ':', default: 1 })
      .build()

    expect(definition).toMatchObject({ name: 'roll', aliases: ['dice'], description: 'Roll a die' })
    expect(definition.parameters?.map((p) => [p.name, p.kind, p.hasDefault, p.default])).toEqual([
      ['sides', 'positional', true, 6],
      ['times', 'special', true, 1]
    ])
    expect(definition.parameters?.[1]?.delimiter).toBe(':')
  })

  it('never mutates an earlier step', () => {
    const base = command('greet')
    const aliased = base.alias('hi')

    expect(base.build().aliases).toBeUndefined()
    expect(aliased.build().aliases).toEqual(['hi'])
  })

  it('marks parameters declared without a default', () => {
    const definition = command('add').param('a', 'int').build()
    expect(definition.parameters?.[0]).toMatchObject({ hasDefault: false })
  })

  it('derives usage from the parameters', () => {
    const registry = new CommandRegistry()
    const echo = registry.register(
      command('say').param('target', 'str').special('loud', 'bool', { default: false }).rest('text', 'str').build()
    )
    expect(echo.usage).toBe('say <target> [loud=…] <text...>')
  })

  it('uses the command delimiter for specials declared without one', () => {
    const registry = new CommandRegistry()
    const search = registry.register(command('search').delimiter(':').special('limit', 'int').build())
    expect(search.parameters[0]?.delimiter).toBe(':')
    expect(search.tokenizerOptions.specials?.get('limit')).toBe(':')
  })
})
