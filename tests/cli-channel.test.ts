import { PassThrough } from 'node:stream'
import { describe, expect, it, vi } from 'vitest'

import { CliChannel } from '../src/channels/cli.js'
import { MessageBus } from '../src/core/bus.js'
import { makeLogger } from './helpers.js'

function makeConfig(overrides: { enabled?: boolean; allowFrom?: string[] } = {}) {
  return { enabled: true, allowFrom: [], senderId: 'local-user', chatId: 'local-chat', ...overrides }
}

function setup(overrides: { enabled?: boolean; allowFrom?: string[] } = {}) {
  const input = new PassThrough()
  const output = new PassThrough()
  let printed = ''
  output.on('data', (chunk: Buffer) => {
    printed += chunk.toString()
  })
  const bus = new MessageBus()
  const channel = new CliChannel(makeConfig(overrides), bus, makeLogger(), { input, output })
  return { input, bus, channel, printed: () => printed }
}

describe('CliChannel', () => {
  it('publishes inbound message from stdin line', async () => {
    const { input, bus, channel } = setup()

    await channel.start()
    input.write('!ping  \n')

    const inbound = await bus.consumeInbound()
    expect(inbound).toMatchObject({
      channel: 'cli',
      senderId: 'local-user',
      chatId: 'local-chat',
      content: '!ping'
    })
    await channel.stop()
  })

  it('prints outbound messages', async () => {
    const { channel, printed } = setup()

    await channel.start()
    await channel.send({ channel: 'cli', chatId: 'local-chat', content: 'pong' })

    await vi.waitFor(() => expect(printed()).toContain('bot> pong\n'))
    await channel.stop()
  })

  it('refuses senders outside the allow list', async () => {
    const { input, channel, printed } = setup({ allowFrom: ['someone-else'] })

    await channel.start()
    input.write('!ping\n')

    await vi.waitFor(() => expect(printed()).toContain('bot> You are not authorised.\n'))
    await channel.stop()
  })

  it('does nothing when disabled', async () => {
    const { channel, printed } = setup({ enabled: false })

    await channel.start()
    await channel.send({ channel: 'cli', chatId: 'local-chat', content: 'pong' })

    expect(printed()).toBe('')
  })
})
