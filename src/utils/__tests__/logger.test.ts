/**
 * Unit tests for src/utils/logger.ts and src/utils/masking.ts
 */

import { describe, it, expect, afterEach } from 'vitest'
import { Writable } from 'node:stream'
import pino from 'pino'
import { PINO_REDACT_PATHS, maskSecrets, deepMask, MASKED_VALUE } from '../masking.js'
import { createLogger, childLogger, resolveLogLevel, setLogLevel, usePrettyOutput } from '../logger.js'

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/** In-memory pino logger with the same redaction as createLogger */
function createCapturingLogger(name: string): { logger: pino.Logger; getLines: () => string[] } {
  const lines: string[] = []
  const stream = new Writable({
    write(chunk: Buffer, _encoding: string, callback: () => void) {
      lines.push(chunk.toString().trim())
      callback()
    },
  })

  const logger = pino({ name, level: 'trace', redact: PINO_REDACT_PATHS }, stream)
  return { logger, getLines: () => lines }
}

const FAKE_KEY = `sk-ant-${'x'.repeat(24)}`

const savedEnv = { LOG_LEVEL: process.env.LOG_LEVEL, LOOM_LOG_LEVEL: process.env.LOOM_LOG_LEVEL }

afterEach(() => {
  for (const [key, value] of Object.entries(savedEnv)) {
    if (value === undefined) {
      delete process.env[key]
    } else {
      process.env[key] = value
    }
  }
})

// ---------------------------------------------------------------------------
// createLogger
// ---------------------------------------------------------------------------

describe('resolveLogLevel', () => {
  it('reads LOG_LEVEL before LOOM_LOG_LEVEL', () => {
    expect(resolveLogLevel({ LOG_LEVEL: 'warn', LOOM_LOG_LEVEL: 'debug' })).toBe('warn')
  })

  it('falls back to LOOM_LOG_LEVEL', () => {
    expect(resolveLogLevel({ LOOM_LOG_LEVEL: 'error' })).toBe('error')
  })

  it('defaults by NODE_ENV', () => {
    expect(resolveLogLevel({ NODE_ENV: 'production' })).toBe('info')
    expect(resolveLogLevel({ NODE_ENV: 'test' })).toBe('debug')
    expect(resolveLogLevel({})).toBe('warn')
  })
})

describe('usePrettyOutput', () => {
  it('lets LOG_PRETTY override NODE_ENV', () => {
    expect(usePrettyOutput({ NODE_ENV: 'development', LOG_PRETTY: 'false' })).toBe(false)
    expect(usePrettyOutput({ LOG_PRETTY: 'true' })).toBe(true)
    expect(usePrettyOutput({})).toBe(false)
  })
})

describe('createLogger', () => {
  it('honours an explicit level', () => {
    expect(createLogger('explicit', { level: 'error', pretty: false }).level).toBe('error')
  })
})

describe('setLogLevel', () => {
  it('applies a configured level to loggers created without one', () => {
    delete process.env.LOG_LEVEL
    delete process.env.LOOM_LOG_LEVEL
    const following = createLogger('following', { pretty: false })
    const fixed = createLogger('fixed', { level: 'fatal', pretty: false })

    expect(setLogLevel('error')).toBe(true)
    expect(following.level).toBe('error')
    expect(fixed.level).toBe('fatal')

    setLogLevel('silent')
  })

  it('leaves levels alone when the environment pins one', () => {
    process.env.LOG_LEVEL = 'silent'
    const pinned = createLogger('pinned', { pretty: false })

    expect(setLogLevel('debug')).toBe(false)
    expect(pinned.level).toBe('silent')
  })
})

describe('childLogger', () => {
  it('carries bindings into every line', () => {
    const { logger, getLines } = createCapturingLogger('parent')
    const child = childLogger(logger, { generationId: 'gen-1' })

    child.info('attempt started')

    const line: unknown = JSON.parse(getLines()[0] ?? '{}')
    expect(line).toMatchObject({ name: 'parent', generationId: 'gen-1', msg: 'attempt started' })
  })
})

// ---------------------------------------------------------------------------
// Redaction and masking
// ---------------------------------------------------------------------------

describe('PINO_REDACT_PATHS', () => {
  it('redacts credential fields at the top level and one level down', () => {
    const { logger, getLines } = createCapturingLogger('redact')

    logger.info({ apiKey: FAKE_KEY, provider: { api_key: FAKE_KEY } }, 'calling provider')

    const line: unknown = JSON.parse(getLines()[0] ?? '{}')
    expect(line).toMatchObject({ apiKey: '[Redacted]', provider: { api_key: '[Redacted]' } })
  })
})

describe('maskSecrets', () => {
  it('replaces a key embedded in an error message', () => {
    expect(maskSecrets(`provider rejected ${FAKE_KEY} as invalid`)).toBe(`provider rejected ${MASKED_VALUE} as invalid`)
  })

  it('leaves ordinary text alone', () => {
    expect(maskSecrets('Chapter 3 needs a villain')).toBe('Chapter 3 needs a villain')
  })
})

describe('deepMask', () => {
  it('masks credential fields at any depth without touching the input', () => {
    const input = { providers: { custom: { token: 'test-secret', model: 'small' } } }

    expect(deepMask(input)).toEqual({ providers: { custom: { token: MASKED_VALUE, model: 'small' } } })
    expect(input.providers.custom.token).toBe('test-secret')
  })
})
