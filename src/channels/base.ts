import type { ChannelName, InboundMessage, OutboundMessage } from '../core/types.js'

/**
 * A chat transport. Adapters publish what they receive to the bus and
 * deliver what the manager routes back to them by `name`.
 */
export interface Channel {
  readonly name: ChannelName
  start(): Promise<void>
  stop(): Promise<void>
  /** Called only for messages addressed to this channel. */
  send(message: OutboundMessage): Promise<void>
}

/** Decides whether a sender may talk to the bot on a channel. */
export type SenderFilter = (senderId: string) => boolean

/** Open when `allowFrom` is empty, otherwise only listed ids pass. */
export function allowListFilter(allowFrom: readonly string[]): SenderFilter {
  if (allowFrom.length === 0) return () => true
  const allowed = new Set(allowFrom)
  return (senderId) => allowed.has(senderId)
}

export interface InboundFields {
  senderId: string
  senderName?: string
  chatId: string
  content: string
  roles?: string[]
}

/** Stamps a received line with its channel and arrival time. */
export function toInbound(channel: ChannelName, fields: InboundFields, now: Date = new Date()): InboundMessage {
  return { channel, ...fields, timestamp: now.toISOString() }
}
