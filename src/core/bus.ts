import type { InboundMessage, OutboundMessage } from './types.js'

/**
 * FIFO queue whose consumers wait for the next item.
 *
 * After {@link close}, pending and future `take()` calls resolve to `null`
 * once the buffered items are drained.
 */
export class AsyncQueue<T> {
  private items: T[] = []
  private waiters: Array<(item: T | null) => void> = []
  private closed = false

  push(item: T): void {
    if (this.closed) return
    const waiter = this.waiters.shift()
    if (waiter) {
      waiter(item)
      return
    }
    this.items.push(item)
  }

  take(): Promise<T | null> {
    if (this.items.length > 0) return Promise.resolve(this.items.shift() ?? null)
    if (this.closed) return Promise.resolve(null)
    return new Promise<T | null>((resolve) => this.waiters.push(resolve))
  }

  close(): void {
    this.closed = true
    for (const waiter of this.waiters.splice(0)) waiter(null)
  }

  get size(): number {
    return this.items.length
  }
}

/**
 * Minimal async message bus.
 *
 * Keeps channel adapters and the command loop decoupled through inbound/outbound queues.
 */
export class MessageBus {
  private readonly inbound = new AsyncQueue<InboundMessage>()
  private readonly outbound = new AsyncQueue<OutboundMessage>()

  /** Publishes an inbound message to the command loop. */
  async publishInbound(msg: InboundMessage): Promise<void> {
    this.inbound.push(msg)
  }

  /** Waits for the next inbound message; `null` once the bus is closed. */
  consumeInbound(): Promise<InboundMessage | null> {
    return this.inbound.take()
  }

  /** Publishes an outbound message for channel delivery. */
  async publishOutbound(msg: OutboundMessage): Promise<void> {
    this.outbound.push(msg)
  }

  /** Waits for the next outbound message; `null` once the bus is closed. */
  consumeOutbound(): Promise<OutboundMessage | null> {
    return this.outbound.take()
  }

  /** Wakes every waiting consumer with `null` and drops later publishes. */
  close(): void {
    this.inbound.close()
    this.outbound.close()
  }
}
