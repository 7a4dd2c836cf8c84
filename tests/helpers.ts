import { vi } from 'vitest'

import { Command } from '../src/commands/command.js'
import { Invocation, isBound, type CommandContext } from '../src/commands/context.js'
import { ConverterRegistry } from '../src/commands/converters.js'
import type { CommandDefinition, EntityResolver, MessageSender } from '../src/commands/types.js'
import type { InboundMessage, Logger } from '../src/core/types.js'

export function makeLogger() {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() } satisfies Logger
}

export function makeMessage(overrides: Partial<InboundMessage> = {}): InboundMessage {
  return {
    channel: 'cli',
    senderId: 'u1',
    senderName: 'alice',
    chatId: 'c1',
    content: '',
    timestamp: '2024-01-01T00:00:00.000Z',
    ...overrides
  }
}

export const emptyResolver: EntityResolver = {
  resolveEntity: async () => undefined
}

export interface ContextOptions {
  message?: Partial<InboundMessage>
  command?: CommandDefinition
  resolver?: EntityResolver
  sender?: MessageSender
  ownerId?: string
  signal?: AbortSignal
}

/** Builds a bound context around a throwaway command. */
export function makeContext(options: ContextOptions = {}): CommandContext {
  const invocation = new Invocation(makeMessage(options.message), {
    sender: options.sender ?? (async () => undefined),
    resolver: options.resolver ?? emptyResolver,
    ownerId: options.ownerId,
    maxMessageLength: 500,
    signal: options.signal ?? new AbortController().signal
  })
  invocation.command = new Command(options.command ?? { name: 'test' }, {
    converters: new ConverterRegistry(),
    caseInsensitive: true
  })
  if (!isBound(invocation)) throw new Error('command was not attached')
  return invocation
}

/** Returns what `fn` threw, failing when it did not throw. */
export async function caught(fn: () => unknown): Promise<unknown> {
  try {
    await fn()
  } catch (error) {
    return error
  }
  throw new Error('expected an error to be thrown')
}
