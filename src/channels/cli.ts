import readline from 'node:readline'
import type { Readable, Writable } from 'node:stream'

import type { ChatCmdConfig } from '../config/schema.js'
import type { MessageBus } from '../core/bus.js'
import type { Logger, OutboundMessage } from '../core/types.js'
import { allowListFilter, toInbound, type Channel, type SenderFilter } from './base.js'

interface CliChannelIo {
  input: Readable
  output: Writable
}

/**
 * Local terminal channel: every line typed is one inbound chat message.
 */
export class CliChannel implements Channel {
  readonly name = 'cli'
  private rl: readline.Interface | null = null
  private readonly io: CliChannelIo
  private readonly isAllowed: SenderFilter

  constructor(
    private readonly config: ChatCmdConfig['channels']['cli'],
    private readonly bus: MessageBus,
    private readonly logger: Logger,
    io?: Partial<CliChannelIo>
  ) {
    this.io = {
      input: io?.input ?? process.stdin,
      output: io?.output ?? process.stdout
    }
    this.isAllowed = allowListFilter(config.allowFrom)
  }

  async start(): Promise<void> {
    if (!this.config.enabled) return

    this.rl = readline.createInterface({
      input: this.io.input,
      output: this.io.output,
      prompt: 'you> '
    })

    this.rl.on('line', (line) => {
      void this.handleLine(line)
    })
    this.rl.on('close', () => {
      this.logger.info('channel.cli.closed')
    })

    this.io.output.write('CLI channel enabled. Type messages and press Enter.\n')
    this.rl.prompt()
    this.logger.info('channel.cli.start', { senderId: this.config.senderId, chatId: this.config.chatId })
  }

  async stop(): Promise<void> {
    if (!this.rl) return
    this.rl.close()
    this.rl = null
    this.logger.info('channel.cli.stop')
  }

  async send(message: OutboundMessage): Promise<void> {
    if (!this.config.enabled) return
    if (message.channel !== this.name) return
    if (!message.content.trim()) return

    this.io.output.write(`bot> ${message.content}\n`)
    this.rl?.prompt()
  }

  private async handleLine(raw: string): Promise<void> {
    const content = raw.trim()
    if (!content) {
      this.rl?.prompt()
      return
    }

    if (!this.isAllowed(this.config.senderId)) {
      this.logger.warn('channel.cli.denied', { senderId: this.config.senderId })
      this.io.output.write('bot> You are not authorised.\n')
      this.rl?.prompt()
      return
    }

    await this.bus.publishInbound(
      toInbound(this.name, {
        senderId: this.config.senderId,
        senderName: this.config.senderId,
        chatId: this.config.chatId,
        content
      })
    )
  }
}
