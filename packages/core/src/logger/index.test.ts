import { describe, it, expect, afterEach, vi } from 'vitest'
import { createLogger, createSilentLogger } from './index.js'

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
    // The pretty transport runs in a worker, so only check the logger works.
    const logger = createLogger({ level: 'info', pretty: true })
    expect(logger.level).toBe('info')
  })

  it('child loggers inherit the level', () => {
    vi.stubEnv('NODE_ENV', 'production')
    const logger = createLogger({ level: 'warn', pretty: false })
    expect(logger.child({ box: 'mybox' }).level).toBe('warn')
  })

  it('skips the pretty transport when silent', () => {
    const logger = createLogger({ level: 'silent', pretty: true })
    expect(logger.level).toBe('silent')
  })
})

describe('createSilentLogger', () => {
  it('is silent', () => {
    expect(createSilentLogger().level).toBe('silent')
  })
})
