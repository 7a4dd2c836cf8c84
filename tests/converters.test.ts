import { describe, expect, it } from 'vitest'

import {
  bool,
  clip,
  convertArgument,
  ConverterRegistry,
  float,
  int,
  optional,
  str,
  toConverter,
  union,
  user
} from '../src/commands/converters.js'
import { BadArgument, ConversionError } from '../src/commands/errors.js'
import type { Entity, EntityResolver } from '../src/commands/types.js'
import { caught, makeContext } from './helpers.js'

const ctx = makeContext()

describe('built-in converters', () => {
  it('str returns the raw value', async () => {
    expect(await convertArgument(ctx, 'p', str, ' as is ')).toEqual({ value: ' as is ', absent: false })
  })

  it('int parses trimmed base-10 integers', async () => {
    expect((await convertArgument(ctx, 'p', int, ' -17 ')).value).toBe(-17)
    expect((await convertArgument(ctx, 'p', int, '+3')).value).toBe(3)
  })

  it('int rejects non-numeric input with BadArgument', async () => {
    const error = await caught(() => convertArgument(ctx, 'p', int, '4.5'))
    expect(error).toBeInstanceOf(BadArgument)
    expect(error).toMatchObject({ message: '"4.5" is not a valid integer.', value: '4.5' })
  })

  it('float accepts decimals and exponents', async () => {
    expect((await convertArgument(ctx, 'p', float, '2.5')).value).toBe(2.5)
    expect((await convertArgument(ctx, 'p', float, '1e3')).value).toBe(1000)
    expect(await caught(() => convertArgument(ctx, 'p', float, 'abc'))).toBeInstanceOf(BadArgument)
  })

  it.each([
    ['true', true],
    ['YES', true],
    ['1', true],
    ['y', true],
    ['false', false],
    ['No', false],
    ['0', false],
    ['n', false]
  ])('bool maps %s to %s', async (raw, expected) => {
    expect((await convertArgument(ctx, 'p', bool, raw)).value).toBe(expected)
  })

  it('bool rejects anything else', async () => {
    const error = await caught(() => convertArgument(ctx, 'p', bool, 'maybe'))
    expect(error).toBeInstanceOf(BadArgument)
  })
})

describe('entity converters', () => {
  const alice: Entity = { kind: 'user', id: '1001', name: 'alice' }
  const seen: string[] = []
  const resolver: EntityResolver = {
    async resolveEntity(_ctx, kind, raw) {
      seen.push(`${kind}:${raw}`)
      if (kind === 'user' && raw === 'alice') return alice
      if (kind === 'clip' && raw === 'AbcClip') return { kind: 'clip', id: 'AbcClip', name: 'a clip' }
      return undefined
    }
  }
  const withResolver = makeContext({ resolver })

  it('user strips @ and lowercases before resolving', async () => {
    expect((await convertArgument(withResolver, 'who', user, '@Alice')).value).toBe(alice)
    expect(seen).toContain('user:alice')
  })

  it('surfaces a missing entity as BadArgument', async () => {
    const error = await caught(() => convertArgument(withResolver, 'who', user, 'nobody'))
    expect(error).toBeInstanceOf(BadArgument)
    expect(error).toMatchObject({ message: 'User "nobody" was not found.' })
  })

  it('clip takes the last path segment of a URL', async () => {
    const result = await convertArgument(withResolver, 'c', clip, 'https://clips.example.com/AbcClip?t=3')
    expect(result.value).toMatchObject({ id: 'AbcClip' })
  })
})

describe('custom converters', () => {
  it('wraps a plain function', async () => {
    const shout = toConverter((_ctx, raw: string) => raw.toUpperCase())
    expect((await convertArgument(ctx, 'p', shout, 'hey')).value).toBe('HEY')
  })

  it('wraps a class exposing convert', async () => {
    class Even {
      convert(_ctx: unknown, raw: string): number {
        const n = Number(raw)
        if (n % 2 !== 0) throw new BadArgument(`${raw} is odd.`, raw)
        return n
      }
    }
    const converter = toConverter(new Even())
    expect(converter.name).toBe('Even')
    expect((await convertArgument(ctx, 'p', converter, '4')).value).toBe(4)
    expect(await caught(() => convertArgument(ctx, 'p', converter, '3'))).toMatchObject({ message: '3 is odd.' })
  })

  it('wraps other errors in BadArgument and keeps the cause', async () => {
    const cause = new Error('boom')
    const failing = toConverter(function failing(): string {
      throw cause
    })
    const error = await caught(() => convertArgument(ctx, 'p', failing, 'x'))
    expect(error).toBeInstanceOf(BadArgument)
    expect(error).toMatchObject({ message: 'Failed to convert "x" for "p": boom', cause })
  })
})

describe('union', () => {
  const intOrStr = union(int, str)

  it('takes the first variant that converts', async () => {
    expect((await convertArgument(ctx, 'p', intOrStr, '42')).value).toBe(42)
    expect((await convertArgument(ctx, 'p', intOrStr, 'abc')).value).toBe('abc')
  })

  it('aggregates every failure reason when all variants fail', async () => {
    const error = await caught(() => convertArgument(ctx, 'p', union(int, bool), 'abc'))
    expect(error).toBeInstanceOf(ConversionError)
    expect(error).toMatchObject({
      parameter: 'p',
      failures: [
        { converter: 'int', reason: '"abc" is not a valid integer.' },
        { converter: 'bool', reason: '"abc" is not a recognised boolean.' }
      ]
    })
  })
})

describe('optional', () => {
  it('reports an absent value instead of failing', async () => {
    expect(await convertArgument(ctx, 'p', optional(int), 'abc')).toEqual({ value: undefined, absent: true })
    expect(await convertArgument(ctx, 'p', optional(int), '5')).toEqual({ value: 5, absent: false })
  })
})

describe('ConverterRegistry', () => {
  it('resolves built-in names and registered types', () => {
    const registry = new ConverterRegistry()
    expect(registry.resolve('int')).toBe(int)
    registry.register('upper', (_ctx, raw: string) => raw.toUpperCase())
    expect(registry.has('upper')).toBe(true)
  })

  it('throws a TypeError for an unknown name', () => {
    expect(() => new ConverterRegistry().resolve('colour')).toThrow(TypeError)
  })
})
