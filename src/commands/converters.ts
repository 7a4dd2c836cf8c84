import type { CommandContext } from './context.js'
import { BadArgument, ConversionError, describeError, type ConversionFailure } from './errors.js'
import type { Awaitable, Entity, EntityKind } from './types.js'

/** Function-shaped converter: `(ctx, raw) => value`. Throw to reject. */
export type ConverterFn<T> = (ctx: CommandContext, raw: string) => Awaitable<T>

/** Class-shaped converter, for stateful or multi-step conversion. */
export interface ConverterClass<T> {
  convert(ctx: CommandContext, raw: string): Awaitable<T>
}

export type ConversionResult<T> =
  | { ok: true; value: T; absent: boolean }
  | { ok: false; failures: ConversionFailure[]; cause: unknown }

/**
 * Normalized converter. Unions and optionals are built from these.
 */
export interface Converter<T> {
  readonly name: string
  /** True when the converter has an absent-value variant. */
  readonly optional: boolean
  attempt(ctx: CommandContext, raw: string): Promise<ConversionResult<T>>
}

/** Anything a parameter may declare as its type. */
export type TypeSpec<T> = Converter<T> | ConverterFn<T> | ConverterClass<T>

/**
 * Types addressable by name in a parameter declaration.
 * Augment this interface when registering further named converters.
 */
export interface ConverterTypeMap {
  str: string
  int: number
  float: number
  bool: boolean
  user: Entity
  channel: Entity
  clip: Entity
}

export type TypeName = keyof ConverterTypeMap

function isConverter<T>(spec: TypeSpec<T>): spec is Converter<T> {
  return typeof spec !== 'function' && 'attempt' in spec
}

function variant<T>(name: string, run: (ctx: CommandContext, raw: string) => Awaitable<T>): Converter<T> {
  return {
    name,
    optional: false,
    async attempt(ctx, raw) {
      try {
        return { ok: true, value: await run(ctx, raw), absent: false }
      } catch (error) {
        return { ok: false, failures: [{ converter: name, reason: describeError(error) }], cause: error }
      }
    }
  }
}

/** Wraps a plain function or a `convert`-bearing object as a converter. */
export function toConverter<T>(spec: TypeSpec<T>): Converter<T> {
  if (isConverter(spec)) return spec
  if (typeof spec === 'function') return variant(spec.name || 'converter', spec)
  const name = spec.constructor.name !== 'Object' ? spec.constructor.name : 'converter'
  return variant(name, (ctx, raw) => spec.convert(ctx, raw))
}

/** Defines a named function converter. */
export function converter<T>(name: string, fn: ConverterFn<T>): Converter<T> {
  return variant(name, fn)
}

const INTEGER = /^[+-]?\d+$/
const DECIMAL = /^[+-]?(\d+\.?\d*|\.\d+)(e[+-]?\d+)?$/i
const TRUTHY = new Set(['true', 'yes', '1', 'y'])
const FALSY = new Set(['false', 'no', '0', 'n'])

export const str: Converter<string> = variant('str', (_ctx, raw) => raw)

export const int: Converter<number> = variant('int', (_ctx, raw) => {
  const trimmed = raw.trim()
  if (!INTEGER.test(trimmed)) throw new BadArgument(`"${raw}" is not a valid integer.`, raw)
  const value = Number.parseInt(trimmed, 10)
  if (!Number.isSafeInteger(value)) throw new BadArgument(`"${raw}" is out of range.`, raw)
  return value
})

export const float: Converter<number> = variant('float', (_ctx, raw) => {
  const trimmed = raw.trim()
  if (!DECIMAL.test(trimmed)) throw new BadArgument(`"${raw}" is not a valid number.`, raw)
  return Number.parseFloat(trimmed)
})

export const bool: Converter<boolean> = variant('bool', (_ctx, raw) => {
  const lowered = raw.trim().toLowerCase()
  if (TRUTHY.has(lowered)) return true
  if (FALSY.has(lowered)) return false
  throw new BadArgument(`"${raw}" is not a recognised boolean.`, raw)
})

function entity(kind: EntityKind, normalize: (raw: string) => string): Converter<Entity> {
  return variant(kind, async (ctx, raw) => {
    const lookup = normalize(raw)
    const found = await ctx.resolveEntity(kind, lookup)
    if (!found) throw new BadArgument(`${kind[0]?.toUpperCase()}${kind.slice(1)} "${lookup}" was not found.`, raw)
    return found
  })
}

/** Resolves a user by id or login; a leading `@` is ignored. */
export const user: Converter<Entity> = entity('user', (raw) => raw.replace(/^@/, '').toLowerCase())

export const channel: Converter<Entity> = entity('channel', (raw) => raw.replace(/^#/, '').toLowerCase())

/** Accepts a clip id or a clip URL (the last path segment is the id). */
export const clip: Converter<Entity> = entity('clip', (raw) => {
  if (!/^https?:\/\//i.test(raw)) return raw
  const path = raw.replace(/[?#].*$/, '').replace(/\/+$/, '')
  return path.slice(path.lastIndexOf('/') + 1)
})

function unionOf(specs: ReadonlyArray<TypeSpec<unknown>>, optional: boolean): Converter<unknown> {
  const members = specs.map((spec) => toConverter(spec))
  const name = members.map((m) => m.name).join(' | ') + (optional ? ' | undefined' : '')

  return {
    name,
    optional: optional || members.some((m) => m.optional),
    async attempt(ctx, raw) {
      const failures: ConversionFailure[] = []
      let cause: unknown
      for (const member of members) {
        const result = await member.attempt(ctx, raw)
        if (result.ok) return result
        failures.push(...result.failures)
        cause = result.cause
      }
      if (optional) return { ok: true, value: undefined, absent: true }
      return { ok: false, failures, cause }
    }
  }
}

/** Tries each converter in the order given; the first success wins. */
export function union<A, B>(a: TypeSpec<A>, b: TypeSpec<B>): Converter<A | B>
export function union<A, B, C>(a: TypeSpec<A>, b: TypeSpec<B>, c: TypeSpec<C>): Converter<A | B | C>
export function union<A, B, C, D>(
  a: TypeSpec<A>,
  b: TypeSpec<B>,
  c: TypeSpec<C>,
  d: TypeSpec<D>
): Converter<A | B | C | D>
export function union(...specs: Array<TypeSpec<unknown>>): Converter<unknown> {
  return unionOf(specs, false)
}

/**
 * Like the wrapped converter, but yields `undefined` instead of failing.
 *
 * A positional token the inner converter rejects is left for the next parameter.
 */
export function optional<T>(spec: TypeSpec<T>): Converter<T | undefined> {
  const inner = toConverter(spec)
  return {
    name: `${inner.name} | undefined`,
    optional: true,
    async attempt(ctx, raw) {
      const result = await inner.attempt(ctx, raw)
      if (result.ok) return result
      return { ok: true, value: undefined, absent: true }
    }
  }
}

/**
 * Maps declared type names to converters. Consulted once, when a command is registered.
 */
export class ConverterRegistry {
  private readonly named = new Map<string, Converter<unknown>>()

  constructor() {
    this.register('str', str)
    this.register('int', int)
    this.register('float', float)
    this.register('bool', bool)
    this.register('user', user)
    this.register('channel', channel)
    this.register('clip', clip)
  }

  /** Registers (or replaces) a named converter. */
  register<T>(name: string, spec: TypeSpec<T>): void {
    this.named.set(name, toConverter(spec))
  }

  has(name: string): boolean {
    return this.named.has(name)
  }

  /** Resolves a declared type; throws `TypeError` for an unknown name. */
  resolve(type: TypeSpec<unknown> | string): Converter<unknown> {
    if (typeof type !== 'string') return toConverter(type)
    const found = this.named.get(type)
    if (!found) throw new TypeError(`No converter is registered for the type "${type}".`)
    return found
  }
}

/**
 * Converts a raw value for a parameter.
 *
 * A lone converter rethrows its own `BadArgument` (or wraps any other error in one);
 * a failed union raises `ConversionError` listing every variant's reason.
 */
export async function convertArgument<T>(
  ctx: CommandContext,
  parameter: string,
  converter: Converter<T>,
  raw: string
): Promise<{ value: T; absent: boolean }> {
  const result = await converter.attempt(ctx, raw)
  if (result.ok) return { value: result.value, absent: result.absent }

  if (result.failures.length > 1) throw new ConversionError(parameter, raw, result.failures)
  if (result.cause instanceof BadArgument) throw result.cause
  throw new BadArgument(
    `Failed to convert "${raw}" for "${parameter}": ${result.failures[0]?.reason ?? 'unknown error'}`,
    raw,
    { cause: result.cause }
  )
}
