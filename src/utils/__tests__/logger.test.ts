/**
 * Unit tests for src/utils/logger.ts: level selection and setLogLevel.
 */

import { describe, it, expect, afterEach } from 'vitest'
import { createLogger, childLogger, setLogLevel } from '../logger.js'

const ENV_KEYS = ['LOG_LEVEL', 'NODE_ENV'] as const
const savedEnv: Record<string, string | undefined> = {}
for (const key of ENV_KEYS) savedEnv[key] = process.env[key]

afterEach(() => {
  for (const key of ENV_KEYS) {
    const value = savedEnv[key]
    if (value === undefined) {
      delete process.env[key]
    } else {
      process.env[key] = value
    }
  }
})

describe('createLogger', () => {
  it('returns a pino logger instance', () => {
    const logger = createLogger('test-module', { pretty: false })
    expect(typeof logger.info).toBe('function')
    expect(typeof logger.warn).toBe('function')
  })

  it('honours an explicit level option', () => {
    const logger = createLogger('explicit', { pretty: false, level: 'error' })
    expect(logger.level).toBe('error')
  })

  it('uses LOG_LEVEL environment variable to override default log level', () => {
    process.env.LOG_LEVEL = 'trace'
    const logger = createLogger('test-level', { pretty: false })
    expect(logger.level).toBe('trace')
  })

  it('uses info level when NODE_ENV = production', () => {
    delete process.env.LOG_LEVEL
    process.env.NODE_ENV = 'production'
    const logger = createLogger('test-prod', { pretty: false })
    expect(logger.level).toBe('info')
  })

  it('stays at warn when neither LOG_LEVEL nor NODE_ENV is set', () => {
    delete process.env.LOG_LEVEL
    delete process.env.NODE_ENV
    const logger = createLogger('test-cli', { pretty: false })
    expect(logger.level).toBe('warn')
  })
})

describe('setLogLevel', () => {
  it('changes the level of every logger created so far', () => {
    const a = createLogger('set-level-a', { pretty: false, level: 'info' })
    const b = createLogger('set-level-b', { pretty: false, level: 'debug' })

    setLogLevel('error')

    expect(a.level).toBe('error')
    expect(b.level).toBe('error')
  })
})

describe('childLogger', () => {
  it('returns a child logger carrying the bindings', () => {
    const parent = createLogger('parent-module', { pretty: false })
    const child = childLogger(parent, { jobname: 'report' })
    expect(child).not.toBe(parent)
    expect(child.bindings()).toMatchObject({ jobname: 'report' })
  })
})
