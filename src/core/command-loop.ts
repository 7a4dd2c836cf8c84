import type { Invocation } from '../commands/context.js'
import type { Dispatcher } from '../commands/dispatcher.js'
import type { MessageBus } from './bus.js'
import type { InboundMessage, Logger } from './types.js'

/**
 * Central message-processing loop.
 *
 * Consumes inbound chat messages and starts one dispatch per message without waiting for
 * earlier ones, so a slow command in one chat never holds up another.
 */
export class CommandLoop {
  private running = false
  private controller = new AbortController()
  private readonly inFlight = new Set<Promise<Invocation | null>>()

  constructor(
    private readonly bus: MessageBus,
    private readonly dispatcher: Dispatcher,
    private readonly logger: Logger
  ) {}

  /** Runs until {@link stop} is called and the bus is closed. */
  async start(): Promise<void> {
    this.running = true
    this.logger.info('loop.start')

    while (this.running) {
      const inbound = await this.bus.consumeInbound()
      if (!inbound || !this.running) break
      this.track(inbound)
    }

    this.logger.info('loop.exit', { inFlight: this.inFlight.size })
  }

  /**
   * Dispatches exactly one queued inbound message and waits for it.
   *
   * Useful for deterministic tests.
   */
  async processOnce(): Promise<Invocation | null> {
    const inbound = await this.bus.consumeInbound()
    if (!inbound) return null
    return this.track(inbound)
  }

  /** Cancels in-flight dispatches and waits for them to settle. */
  async stop(): Promise<void> {
    this.running = false
    this.controller.abort()
    await Promise.allSettled([...this.inFlight])
    this.controller = new AbortController()
  }

  get pending(): number {
    return this.inFlight.size
  }

  private track(inbound: InboundMessage): Promise<Invocation | null> {
    this.logger.debug('loop.inbound', { channel: inbound.channel, chatId: inbound.chatId, senderId: inbound.senderId })
    const task = this.dispatcher.dispatch(inbound, this.controller.signal)
    this.inFlight.add(task)
    const forget = (): void => {
      this.inFlight.delete(task)
    }
    void task.then(forget, forget)
    return task
  }
}
