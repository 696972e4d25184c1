/**
 * Unit tests for src/utils/logger.ts: level resolution, bindings and redaction.
 */

import { describe, it, expect } from 'vitest'
import { Writable } from 'node:stream'
import type pino from 'pino'
import { childLogger, createLogger, resolveLogLevel, resolvePretty, setLogLevel } from '../logger.js'

function capture(name: string): { log: pino.Logger; records: () => unknown[] } {
  const lines: string[] = []
  const destination = new Writable({
    write(chunk: Buffer, _encoding: string, callback: () => void) {
      lines.push(chunk.toString().trim())
      callback()
    },
  })
  const log = createLogger(name, { level: 'trace', destination })
  return { log, records: () => lines.map((line): unknown => JSON.parse(line)) }
}

describe('resolveLogLevel', () => {
  it('prefers LOG_LEVEL', () => {
    expect(resolveLogLevel({ LOG_LEVEL: 'error', NODE_ENV: 'production' })).toBe('error')
  })

  it('accepts LOG_LEVEL in any case', () => {
    expect(resolveLogLevel({ LOG_LEVEL: 'DEBUG' })).toBe('debug')
  })

  it('ignores an unknown LOG_LEVEL', () => {
    expect(resolveLogLevel({ LOG_LEVEL: 'loud', NODE_ENV: 'production' })).toBe('info')
  })

  it('logs at debug in development and test', () => {
    expect(resolveLogLevel({ NODE_ENV: 'development' })).toBe('debug')
    expect(resolveLogLevel({ NODE_ENV: 'test' })).toBe('debug')
  })

  it('defaults to warn for a plain CLI invocation', () => {
    expect(resolveLogLevel({})).toBe('warn')
  })
})

describe('resolvePretty', () => {
  it('follows LOG_PRETTY when set', () => {
    expect(resolvePretty({ LOG_PRETTY: 'false', NODE_ENV: 'development' })).toBe(false)
    expect(resolvePretty({ LOG_PRETTY: 'true', NODE_ENV: 'production' })).toBe(true)
  })

  it('is pretty only in development and test otherwise', () => {
    expect(resolvePretty({ NODE_ENV: 'test' })).toBe(true)
    expect(resolvePretty({ NODE_ENV: 'production' })).toBe(false)
    expect(resolvePretty({})).toBe(false)
  })
})

describe('createLogger', () => {
  it('honours an explicit level', () => {
    expect(createLogger('test-module', { pretty: false, level: 'error' }).level).toBe('error')
  })

  it('names records after the module', () => {
    const { log, records } = capture('debate:session')
    log.info('started')
    expect(records()[0]).toMatchObject({ name: 'debate:session', level: 'info', msg: 'started' })
  })
})

describe('setLogLevel', () => {
  it('moves loggers without a pinned level and leaves pinned ones alone', () => {
    const floating = createLogger('floating', { pretty: false })
    const pinned = createLogger('pinned', { pretty: false, level: 'error' })

    setLogLevel('debug')
    expect(floating.level).toBe('debug')
    expect(pinned.level).toBe('error')

    setLogLevel('silent')
    expect(floating.level).toBe('silent')
  })
})

describe('childLogger', () => {
  it('binds debate context fields', () => {
    const { log, records } = capture('parent')
    const child = childLogger(log, { runId: 'run-1', agentId: 'agent-a', stage: 'review' })

    child.info('bound')

    expect(records()[0]).toMatchObject({
      runId: 'run-1',
      agentId: 'agent-a',
      stage: 'review',
      msg: 'bound',
    })
  })
})

describe('redaction', () => {
  it('redacts apiKey fields', () => {
    const { log, records } = capture('redact-test')
    log.info({ apiKey: 'test-secret' }, 'test redaction')
    expect(records()[0]).toMatchObject({ apiKey: '[Redacted]' })
  })

  it('redacts provider keys held in an env object', () => {
    const { log, records } = capture('redact-env')
    log.info({ env: { GOOGLE_API_KEY: 'test-secret', HOME: '/home/test' } }, 'env dump')
    expect(records()[0]).toMatchObject({ env: { GOOGLE_API_KEY: '[Redacted]', HOME: '/home/test' } })
  })

  it('redacts nested api_key fields', () => {
    const { log, records } = capture('redact-nested')
    log.info({ provider: { api_key: 'test-secret' } }, 'nested')
    expect(records()[0]).toMatchObject({ provider: { api_key: '[Redacted]' } })
  })
})
