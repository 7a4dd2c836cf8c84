import type { MessageBus } from '../core/bus.js'
import type { Logger } from '../core/types.js'
import type { Channel } from './base.js'

/**
 * Owns channel adapter lifecycle and outbound message dispatching.
 */
export class ChannelManager {
  private outboundLoop: Promise<void> | null = null

  constructor(
    private readonly channels: readonly Channel[],
    private readonly bus: MessageBus,
    private readonly logger: Logger
  ) {}

  /** Starts all adapters and launches the outbound dispatcher. */
  async startAll(): Promise<void> {
    for (const channel of this.channels) {
      await channel.start()
    }
    this.outboundLoop = this.dispatchOutbound()
  }

  /**
   * Stops all adapters. The outbound loop ends once the bus is closed.
   */
  async stopAll(): Promise<void> {
    for (const channel of this.channels) {
      await channel.stop()
    }
    if (this.outboundLoop) {
      await this.outboundLoop
      this.outboundLoop = null
    }
  }

  private async dispatchOutbound(): Promise<void> {
    for (;;) {
      const msg = await this.bus.consumeOutbound()
      if (!msg) return
      const channel = this.channels.find((ch) => ch.name === msg.channel)

      if (!channel) {
        this.logger.warn('channel.unknown', { channel: msg.channel })
        continue
      }

      try {
        await channel.send(msg)
      } catch (error) {
        this.logger.error('channel.send_failed', {
          channel: msg.channel,
          error: error instanceof Error ? error.message : String(error)
        })
      }
    }
  }
}
