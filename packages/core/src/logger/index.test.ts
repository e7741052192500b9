import { describe, it, expect, afterEach, vi } from 'vitest'
import type { DestinationStream } from 'pino'
import { createLogger } from './index.js'

afterEach(() => {
  vi.unstubAllEnvs()
})

function collect(): { lines: string[]; stream: DestinationStream } {
  const lines: string[] = []
  return {
    lines,
    stream: {
      write(msg: string) {
        lines.push(msg)
      },
    },
  }
}

describe('createLogger', () => {
  it('creates logger with specified level', () => {
    vi.stubEnv('NODE_ENV', 'production')
    const logger = createLogger({ level: 'debug', pretty: false })
    expect(logger.level).toBe('debug')
  })

  it('no pino-pretty when pretty: false in production', () => {
    vi.stubEnv('NODE_ENV', 'production')
    const logger = createLogger({ level: 'warn', pretty: false })
    expect(logger.level).toBe('warn')
  })

  it('writes JSON records to an explicit destination', () => {
    const { lines, stream } = collect()
    const logger = createLogger({ level: 'info', pretty: true }, stream)

    logger.error({ url: 'ftp://x' }, 'invalid <url>: not an HTTP address')

    expect(lines).toHaveLength(1)
    const record = JSON.parse(lines[0])
    expect(record.level).toBe(50)
    expect(record.url).toBe('ftp://x')
    expect(record.msg).toBe('invalid <url>: not an HTTP address')
  })

  it('drops records below the configured level', () => {
    const { lines, stream } = collect()
    const logger = createLogger({ level: 'error', pretty: false }, stream)

    logger.warn('ignored')
    logger.debug('ignored')

    expect(lines).toHaveLength(0)
  })
})
