/**
 * Structured logging for Colloquy.
 *
 * Every module gets a named pino logger writing to stderr, so stdout stays
 * free for command output. Level and formatting come from the environment
 * unless the caller pins them; provider keys are redacted.
 */

import pino from 'pino'
import { PINO_REDACT_PATHS } from '../cli/utils/masking.js'

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal' | 'silent'

const LOG_LEVELS: readonly LogLevel[] = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']

export interface LoggerOptions {
  level?: LogLevel
  pretty?: boolean
  /** Write records here instead of stderr. Never combined with pretty output. */
  destination?: pino.DestinationStream
}

/** Fields a debate component binds onto its child logger */
export interface DebateLogBindings {
  runId?: string
  problemId?: string
  agentId?: string
  stage?: string
}

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value)
}

/**
 * LOG_LEVEL wins when it names a pino level. Otherwise production logs at
 * info, development and test at debug, and a plain CLI invocation at warn.
 */
export function resolveLogLevel(env: NodeJS.ProcessEnv = process.env): LogLevel {
  const requested = env.LOG_LEVEL?.toLowerCase()
  if (requested !== undefined && isLogLevel(requested)) return requested

  switch (env.NODE_ENV) {
    case 'production':
      return 'info'
    case 'development':
    case 'test':
      return 'debug'
    default:
      return 'warn'
  }
}

/** LOG_PRETTY=true|false decides; without it only development and test are pretty. */
export function resolvePretty(env: NodeJS.ProcessEnv = process.env): boolean {
  if (env.LOG_PRETTY !== undefined) return env.LOG_PRETTY === 'true'
  return env.NODE_ENV === 'development' || env.NODE_ENV === 'test'
}

const STDERR_FD = 2

/** Loggers whose level follows setLogLevel */
const adjustable = new Set<pino.Logger>()

/**
 * Create a logger named after the module that owns it, e.g. `debate:session`.
 */
export function createLogger(name: string, options: LoggerOptions = {}): pino.Logger {
  const instance = buildLogger(name, options)
  if (options.level === undefined) adjustable.add(instance)
  return instance
}

/**
 * Move every logger created without a pinned level to `level`.
 * Used once configuration is loaded and LOG_LEVEL is unset.
 */
export function setLogLevel(level: LogLevel): void {
  for (const instance of adjustable) {
    instance.level = level
  }
}

function buildLogger(name: string, options: LoggerOptions): pino.Logger {
  const settings: pino.LoggerOptions = {
    name,
    level: options.level ?? resolveLogLevel(),
    redact: PINO_REDACT_PATHS,
    formatters: {
      level: (label) => ({ level: label }),
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    base: { pid: process.pid },
  }

  if (options.destination !== undefined) {
    return pino(settings, options.destination)
  }

  if (options.pretty ?? resolvePretty()) {
    return pino({
      ...settings,
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:standard',
          ignore: 'pid,hostname',
          destination: STDERR_FD,
        },
      },
    })
  }

  return pino(settings, pino.destination(STDERR_FD))
}

/** Root application logger */
export const logger = createLogger('colloquy')

export function childLogger(parent: pino.Logger, bindings: DebateLogBindings): pino.Logger {
  return parent.child(bindings)
}
