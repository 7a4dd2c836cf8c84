import { describe, expect, it } from 'vitest'

import { command } from '../src/commands/builder.js'
import { CommandExistsError, CommandNotFound, InvalidParameterError } from '../src/commands/errors.js'
import { CommandRegistry } from '../src/commands/registry.js'
import type { CommandDefinition } from '../src/commands/types.js'

function makeCommand(overrides?: Partial<CommandDefinition>): CommandDefinition {
  return {
    name: 'test',
    description: 'A test command',
    async execute() {},
    ...overrides
  }
}

describe('CommandRegistry', () => {
  it('registers and retrieves a command by name', () => {
    const registry = new CommandRegistry()
    const cmd = registry.register(makeCommand({ name: 'ping' }))

    expect(registry.get('ping')).toBe(cmd)
    expect(registry.has('ping')).toBe(true)
  })

  it('retrieves a command by alias', () => {
    const registry = new CommandRegistry()
    const cmd = registry.register(makeCommand({ name: 'shoutout', aliases: ['so', 'promote'] }))

    expect(registry.get('so')).toBe(cmd)
    expect(registry.get('promote')).toBe(cmd)
  })

  it('is case-insensitive by default', () => {
    const registry = new CommandRegistry()
    registry.register(makeCommand({ name: 'Ping' }))

    expect(registry.has('PING')).toBe(true)
    expect(registry.has('ping')).toBe(true)
  })

  it('can match case exactly', () => {
    const registry = new CommandRegistry({ caseInsensitive: false })
    registry.register(makeCommand({ name: 'Ping' }))

    expect(registry.has('Ping')).toBe(true)
    expect(registry.has('ping')).toBe(false)
  })

  it('returns undefined for unknown commands', () => {
    const registry = new CommandRegistry()
    expect(registry.get('nonexistent')).toBeUndefined()
    expect(registry.has('nonexistent')).toBe(false)
  })

  it('lists all registered commands in order', () => {
    const registry = new CommandRegistry()
    registry.register(makeCommand({ name: 'a' }))
    registry.register(makeCommand({ name: 'b' }))

    expect(registry.all().map((c) => c.name)).toEqual(['a', 'b'])
  })

  it('rejects an alias collision and keeps the first registration', () => {
    const registry = new CommandRegistry()
    const first = registry.register(makeCommand({ name: 'first', aliases: ['f'] }))

    expect(() => registry.register(makeCommand({ name: 'second', aliases: ['F'] }))).toThrow(CommandExistsError)
    expect(registry.get('f')).toBe(first)
    expect(registry.has('second')).toBe(false)
    expect(registry.all()).toEqual([first])
  })

  it('rejects a command whose own name and alias collide', () => {
    const registry = new CommandRegistry()
    expect(() => registry.register(makeCommand({ name: 'dup', aliases: ['dup'] }))).toThrow(CommandExistsError)
    expect(registry.has('dup')).toBe(false)
  })

  it('unregisters a command with all of its aliases', () => {
    const registry = new CommandRegistry()
    const cmd = registry.register(makeCommand({ name: 'roll', aliases: ['dice'] }))

    expect(registry.unregister('dice')).toBe(cmd)
    expect(registry.has('roll')).toBe(false)
    expect(registry.has('dice')).toBe(false)
    expect(registry.all()).toEqual([])
  })

  it('validates the parameter model at registration', () => {
    const registry = new CommandRegistry()
    const restFirst = command('bad').rest('text', 'str').param('n', 'int').build()
    const badDelimiter = command('bad').special('n', 'int', { delimiter: '==' }).build()
    const duplicateName: CommandDefinition = {
      name: 'bad',
      parameters: [
        { name: 'x', kind: 'positional', type: 'str', hasDefault: false },
        { name: 'x', kind: 'positional', type: 'int', hasDefault: false }
      ]
    }

    expect(() => registry.register(restFirst)).toThrow(InvalidParameterError)
    expect(() => registry.register(badDelimiter)).toThrow(InvalidParameterError)
    expect(() => registry.register(duplicateName)).toThrow('parameter names must be unique')
    expect(registry.has('bad')).toBe(false)
  })
})

describe('components', () => {
  it('adds and removes every command of a component atomically', () => {
    const registry = new CommandRegistry()
    registry.addComponent({ name: 'fun', commands: [makeCommand({ name: 'roll' }), makeCommand({ name: 'flip' })] })

    expect(registry.get('roll')?.component?.name).toBe('fun')
    expect(registry.components().map((c) => c.name)).toEqual(['fun'])

    registry.removeComponent('fun')
    expect(registry.has('roll')).toBe(false)
    expect(registry.has('flip')).toBe(false)
    expect(registry.getComponent('fun')).toBeUndefined()
  })

  it('registers nothing from a component when one command collides', () => {
    const registry = new CommandRegistry()
    registry.register(makeCommand({ name: 'flip' }))

    expect(() =>
      registry.addComponent({ name: 'fun', commands: [makeCommand({ name: 'roll' }), makeCommand({ name: 'flip' })] })
    ).toThrow(CommandExistsError)
    expect(registry.has('roll')).toBe(false)
    expect(registry.getComponent('fun')).toBeUndefined()
  })

  it('leaves component commands to removeComponent', () => {
    const registry = new CommandRegistry()
    registry.addComponent({ name: 'fun', commands: [makeCommand({ name: 'roll' })] })

    expect(registry.unregister('roll')).toBeUndefined()
    expect(registry.has('roll')).toBe(true)
  })
})

describe('resolve', () => {
  function withConfigGroup(groupBody: boolean) {
    const registry = new CommandRegistry()
    const group = command('config')
      .subcommand(makeCommand({ name: 'get', aliases: ['show'] }), makeCommand({ name: 'set' }))
      .build()
    registry.register(groupBody ? { ...group, async execute() {} } : group)
    return registry
  }

  it('splits the invoked name from the remainder', () => {
    const registry = new CommandRegistry()
    registry.register(makeCommand({ name: 'echo' }))

    const result = registry.resolve('ECHO   hello  there')
    expect(result).toMatchObject({ found: true, invokedWith: 'ECHO', remainder: 'hello  there' })
  })

  it('descends into subcommands', () => {
    const result = withConfigGroup(false).resolve('config show prefix')
    expect(result.found).toBe(true)
    if (!result.found) return
    expect(result.command.qualifiedName).toBe('config get')
    expect(result.subcommandTrigger).toBe('show')
    expect(result.remainder).toBe('prefix')
  })

  it('falls back to a group with a body', () => {
    const result = withConfigGroup(true).resolve('config prefix')
    expect(result).toMatchObject({ found: true, remainder: 'prefix' })
    if (!result.found) return
    expect(result.command.qualifiedName).toBe('config')
  })

  it('names the group and word when a body-less group has no match', () => {
    const result = withConfigGroup(false).resolve('config nope')
    expect(result.found).toBe(false)
    if (result.found) return
    expect(result.error).toBeInstanceOf(CommandNotFound)
    expect(result.error.invokedWith).toBe('config nope')
  })

  it('rejects duplicate subcommand names', () => {
    const registry = new CommandRegistry()
    const group = command('g').subcommand(makeCommand({ name: 'a' }), makeCommand({ name: 'b', aliases: ['A'] })).build()
    expect(() => registry.register(group)).toThrow(CommandExistsError)
  })

  it('reports an unknown top-level name', () => {
    const result = new CommandRegistry().resolve('nothing here')
    expect(result).toMatchObject({ found: false, invokedWith: 'nothing' })
  })
})
