import { afterEach, describe, expect, it, vi } from 'vitest'

import { createLogger } from '../src/core/logger.js'

describe('createLogger', () => {
  afterEach(() => {
    vi.useRealTimers()
  })

  it('writes one JSON object per event', () => {
    vi.useFakeTimers()
    vi.setSystemTime(new Date('2024-05-01T12:00:00.000Z'))
    const lines: string[] = []
    const logger = createLogger({ scope: 'commands', write: (line) => lines.push(line) })

    logger.info('dispatch.completed', { command: 'ping' })

    expect(lines).toHaveLength(1)
    expect(JSON.parse(lines[0] ?? '')).toEqual({
      ts: '2024-05-01T12:00:00.000Z',
      level: 'INFO',
      scope: 'commands',
      event: 'dispatch.completed',
      command: 'ping'
    })
  })

  it('drops events below the minimum level', () => {
    const lines: string[] = []
    const logger = createLogger({ level: 'warn', write: (line) => lines.push(line) })

    logger.debug('a')
    logger.info('b')
    logger.warn('c')
    logger.error('d')

    expect(lines.map((line) => JSON.parse(line).event)).toEqual(['c', 'd'])
  })
})
