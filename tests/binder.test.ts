import { describe, expect, it } from 'vitest'

import { bindArguments } from '../src/commands/binder.js'
import { command } from '../src/commands/builder.js'
import { int, optional, str } from '../src/commands/converters.js'
import { ArgumentParsingFailed, BadArgument, MissingRequiredArgument } from '../src/commands/errors.js'
import { tokenize } from '../src/commands/tokenizer.js'
import type { CommandDefinition } from '../src/commands/types.js'
import { caught, makeContext } from './helpers.js'

async function bind(definition: CommandDefinition, text: string) {
  const ctx = makeContext({ command: definition })
  const input = tokenize(text, ctx.command.tokenizerOptions)
  return bindArguments(ctx, ctx.command.parameters, input, { ignoreExtra: ctx.command.ignoreExtraArguments })
}

describe('bindArguments', () => {
  it('binds positional tokens in declared order, converting each', async () => {
    const def = command('add').param('a', 'int').param('b', 'int').build()
    expect(await bind(def, '2 3')).toEqual({ a: 2, b: 3 })
  })

  it('raises MissingRequiredArgument for a required positional', async () => {
    const def = command('add').param('a', 'int').param('b', 'int').build()
    const error = await caught(() => bind(def, '2'))
    expect(error).toBeInstanceOf(MissingRequiredArgument)
    expect(error).toMatchObject({ parameter: 'b' })
  })

  it('falls back to the default when no token remains', async () => {
    const def = command('roll').param('sides', 'int', { default: 6 }).build()
    expect(await bind(def, '')).toEqual({ sides: 6 })
  })

  it('stops at the first bad value', async () => {
    let converted = 0
    const counting = (_ctx: unknown, raw: string): string => {
      converted += 1
      return raw
    }
    const def = command('x').param('a', 'int').param('b', counting).build()
    const error = await caught(() => bind(def, 'nope later'))
    expect(error).toBeInstanceOf(BadArgument)
    expect(converted).toBe(0)
  })

  it('leaves a token rejected by an optional converter for the next parameter', async () => {
    const def = command('give').param('amount', optional(int)).param('item', str).build()
    expect(await bind(def, 'apple')).toEqual({ amount: undefined, item: 'apple' })
    expect(await bind(def, '3 apple')).toEqual({ amount: 3, item: 'apple' })
  })

  it('uses the default of an optional parameter whose token was rejected', async () => {
    const def = command('give').param('amount', optional(int), { default: 1 }).param('item', str).build()
    expect(await bind(def, 'apple')).toEqual({ amount: 1, item: 'apple' })
  })

  it('binds special parameters by key', async () => {
    const def = command('search').param('query', 'str').special('limit', 'int', { default: 10 }).build()
    expect(await bind(def, 'limit=5 cats')).toEqual({ query: 'cats', limit: 5 })
    expect(await bind(def, 'cats')).toEqual({ query: 'cats', limit: 10 })
  })

  it('raises MissingRequiredArgument for a required special', async () => {
    const def = command('search').special('limit', 'int').build()
    expect(await caught(() => bind(def, ''))).toMatchObject({ parameter: 'limit' })
  })

  it('passes the consume-rest text verbatim', async () => {
    const def = command('echo').rest('text', 'str').build()
    expect(await bind(def, 'hello   world')).toEqual({ text: 'hello   world' })
  })

  it('starts the rest text at a token an optional parameter declined', async () => {
    const def = command('say').param('times', optional(int)).rest('text', 'str').build()
    expect(await bind(def, 'hello   world')).toEqual({ times: undefined, text: 'hello   world' })
    expect(await bind(def, '3 hello world')).toEqual({ times: 3, text: 'hello world' })
  })

  it('binds a required special that follows the rest text', async () => {
    const def = command('tell').special('user', 'str').rest('text', 'str').build()
    expect(await bind(def, 'hello user=alice there')).toEqual({ user: 'alice', text: 'hello there' })
  })

  it('counts a declined token claimed by the rest text as consumed in strict mode', async () => {
    const def = command('say').param('times', optional(int)).rest('text', 'str').strict().build()
    expect(await bind(def, 'hello world')).toEqual({ times: undefined, text: 'hello world' })
  })

  it('uses the rest default when the remainder is empty', async () => {
    const def = command('echo').rest('text', 'str', { default: '...' }).build()
    expect(await bind(def, '')).toEqual({ text: '...' })
  })

  it('ignores surplus tokens unless the command is strict', async () => {
    const lenient = command('one').param('a', 'str').build()
    expect(await bind(lenient, 'x y z')).toEqual({ a: 'x' })

    const strict = command('one').param('a', 'str').strict().build()
    const error = await caught(() => bind(strict, 'x y z'))
    expect(error).toBeInstanceOf(ArgumentParsingFailed)
    expect(error).toMatchObject({ message: 'Too many arguments, starting with "y" (at position 2)', position: 2 })
  })
})
