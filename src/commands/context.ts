import type { InboundMessage } from '../core/types.js'
import { splitMessage } from '../core/message-split.js'
import type { Command } from './command.js'
import type { CommandError } from './errors.js'
import type { TokenizedInput } from './tokenizer.js'
import type { BoundArgs, Entity, EntityKind, EntityResolver, MessageSender } from './types.js'

/** Pipeline stage an invocation is in (or ended in). */
export type DispatchState =
  | 'prefix'
  | 'lookup'
  | 'tokenize'
  | 'bind'
  | 'guard'
  | 'cooldown'
  | 'invoke'
  | 'completed'
  | 'failed'
  | 'cancelled'

export type InvocationOutcome =
  | { status: 'pending' }
  | { status: 'completed' }
  | { status: 'failed'; error: CommandError; state: DispatchState }
  | { status: 'cancelled'; state: DispatchState }

export interface InvocationServices {
  sender: MessageSender
  resolver: EntityResolver
  ownerId?: string
  maxMessageLength: number
  signal: AbortSignal
}

/**
 * Per-message record owned by the dispatcher for the lifetime of one call.
 */
export class Invocation {
  state: DispatchState = 'prefix'
  prefix?: string
  /** Name or alias the top-level command was invoked with. */
  invokedWith?: string
  command?: Command
  /** Name or alias the innermost subcommand was invoked with. */
  subcommandTrigger?: string
  /** Text after the resolved command name(s). */
  remainder = ''
  tokens?: TokenizedInput
  args: BoundArgs = {}
  outcome: InvocationOutcome = { status: 'pending' }

  constructor(
    readonly message: InboundMessage,
    private readonly services: InvocationServices
  ) {}

  get content(): string {
    return this.message.content
  }

  get signal(): AbortSignal {
    return this.services.signal
  }

  get isOwner(): boolean {
    return this.services.ownerId !== undefined && this.services.ownerId === this.message.senderId
  }

  /** Replies in the originating chat, split into chunks the transport accepts. */
  async send(text: string): Promise<void> {
    if (!text) return
    for (const chunk of splitMessage(text, this.services.maxMessageLength)) {
      await this.services.sender(this.message, chunk)
    }
  }

  resolveEntity(kind: EntityKind, raw: string): Promise<Entity | undefined> {
    if (!isBound(this)) return Promise.resolve(undefined)
    return this.services.resolver.resolveEntity(this, kind, raw)
  }
}

/** Invocation whose command has been resolved; what converters, guards and bodies see. */
export interface CommandContext extends Invocation {
  readonly command: Command
}

export function isBound(invocation: Invocation): invocation is CommandContext {
  return invocation.command !== undefined
}
