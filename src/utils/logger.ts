/**
 * Structured logging for the engine and the `loom` CLI.
 *
 * Log lines go to stderr so that command output on stdout stays parseable.
 * Module loggers are registered so a level read from configuration can be
 * applied to all of them after they were created.
 */

import pino from 'pino'
import { PINO_REDACT_PATHS } from './masking.js'

export interface LoggerOptions {
  level?: string
  pretty?: boolean
}

/** Env variables that pin the level, in precedence order */
const LEVEL_ENV_KEYS = ['LOG_LEVEL', 'LOOM_LOG_LEVEL'] as const

const STDERR_FD = 2

const registered = new Set<pino.Logger>()

/**
 * The level named by the environment, if any.
 */
export function envLogLevel(env: NodeJS.ProcessEnv = process.env): string | undefined {
  for (const key of LEVEL_ENV_KEYS) {
    const value = env[key]
    if (value !== undefined && value !== '') return value
  }
  return undefined
}

export function resolveLogLevel(env: NodeJS.ProcessEnv = process.env): string {
  const pinned = envLogLevel(env)
  if (pinned !== undefined) return pinned
  switch (env.NODE_ENV) {
    case 'production':
      return 'info'
    case 'development':
    case 'test':
      return 'debug'
    default:
      // Plain CLI use
      return 'warn'
  }
}

/**
 * pino-pretty is a dev dependency, so pretty output is opt-in outside
 * development and test.
 */
export function usePrettyOutput(env: NodeJS.ProcessEnv = process.env): boolean {
  if (env.LOG_PRETTY !== undefined) return env.LOG_PRETTY === 'true'
  return env.NODE_ENV === 'development' || env.NODE_ENV === 'test'
}

/**
 * Create a named logger.
 *
 * Loggers created without an explicit level follow later `setLogLevel` calls.
 */
export function createLogger(name: string, options: LoggerOptions = {}): pino.Logger {
  const pretty = options.pretty ?? usePrettyOutput()
  const loggerOptions: pino.LoggerOptions = {
    name,
    level: options.level ?? resolveLogLevel(),
    redact: PINO_REDACT_PATHS,
    formatters: {
      level: (label) => ({ level: label }),
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    base: { pid: process.pid },
  }

  const instance = pretty
    ? pino({
        ...loggerOptions,
        transport: {
          target: 'pino-pretty',
          options: { colorize: true, translateTime: 'SYS:standard', ignore: 'pid,hostname', destination: STDERR_FD },
        },
      })
    : pino(loggerOptions, pino.destination(STDERR_FD))

  if (options.level === undefined) registered.add(instance)
  return instance
}

/**
 * Apply a configured level to every registered logger.
 *
 * A level pinned through the environment wins, so this is a no-op when one
 * is set.
 *
 * @returns whether the level was applied
 */
export function setLogLevel(level: string): boolean {
  if (envLogLevel() !== undefined) return false
  for (const instance of registered) {
    instance.level = level
  }
  return true
}

export const logger = createLogger('storyloom')

export function childLogger(parent: pino.Logger, bindings: Record<string, unknown>): pino.Logger {
  return parent.child(bindings)
}
