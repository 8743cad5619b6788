import { describe, it, expect, afterEach, vi } from 'vitest'
import { createLogger } from './index.js'

afterEach(() => {
  vi.unstubAllEnvs()
})

describe('createLogger', () => {
  it('creates logger with specified level', () => {
    vi.stubEnv('NODE_ENV', 'production')
    const logger = createLogger({ level: 'debug', pretty: false })
    expect(logger.level).toBe('debug')
  })

  it('uses pino-pretty when pretty: true', () => {
    vi.stubEnv('NODE_ENV', 'production')
    // The pretty transport runs in a worker, so only the logger itself
    // can be inspected here.
    const logger = createLogger({ level: 'info', pretty: true })
    expect(logger.level).toBe('info')
  })

  it('binds the name when one is given', () => {
    vi.stubEnv('NODE_ENV', 'production')
    const logger = createLogger({ level: 'warn', pretty: false }, 'portico')
    expect(logger.bindings().name).toBe('portico')
  })

  it('child loggers inherit the level', () => {
    vi.stubEnv('NODE_ENV', 'production')
    const logger = createLogger({ level: 'error', pretty: false })
    const child = logger.child({ endpoint: 'Shop.Endpoint' })

    expect(child.level).toBe('error')
    expect(child.bindings().endpoint).toBe('Shop.Endpoint')
  })
})

describe('createLogger with a destination', () => {
  function capture(): { lines: string[]; write: (msg: string) => void } {
    const lines: string[] = []
    return { lines, write: (msg: string) => lines.push(msg) }
  }

  it('writes JSON lines to the destination', () => {
    const dest = capture()
    const logger = createLogger({ level: 'info', pretty: true }, 'portico', dest)

    logger.info({ endpoint: 'Shop.Endpoint' }, 'Endpoint started')

    expect(dest.lines).toHaveLength(1)
    expect(JSON.parse(dest.lines[0])).toMatchObject({
      name: 'portico',
      endpoint: 'Shop.Endpoint',
      msg: 'Endpoint started',
    })
  })

  it('redacts secret key bases and inline TLS keys', () => {
    const dest = capture()
    const logger = createLogger({ level: 'info', pretty: false }, undefined, dest)

    logger.info(
      { config: { secretKeyBase: 'test-secret' }, options: { key: 'test-key', port: 4040 } },
      'Resolved',
    )

    const record = JSON.parse(dest.lines[0])
    expect(record.config.secretKeyBase).toBe('[Redacted]')
    expect(record.options).toEqual({ key: '[Redacted]', port: 4040 })
  })
})
