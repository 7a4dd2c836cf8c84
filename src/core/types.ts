/** Identifier of the transport a message arrived on (e.g. "cli"). */
export type ChannelName = string

/**
 * Normalized inbound message emitted by a channel adapter.
 */
export interface InboundMessage {
  channel: ChannelName
  senderId: string
  /** Display/login name of the sender, when the transport knows it. */
  senderName?: string
  /** Roles the sender holds in this chat (e.g. "moderator"). */
  roles?: string[]
  chatId: string
  content: string
  timestamp: string
  metadata?: Record<string, unknown>
}

/**
 * Normalized outbound message consumed by a channel adapter.
 */
export interface OutboundMessage {
  channel: ChannelName
  chatId: string
  content: string
  replyTo?: string
  metadata?: Record<string, unknown>
}

export type LogLevel = 'debug' | 'info' | 'warn' | 'error'

/**
 * Minimal structured logger interface used across modules.
 */
export interface Logger {
  debug(event: string, data?: Record<string, unknown>): void
  info(event: string, data?: Record<string, unknown>): void
  warn(event: string, data?: Record<string, unknown>): void
  error(event: string, data?: Record<string, unknown>): void
}
