/**
 * Logger utility for Waymark
 * pino structured JSON logging to stderr, pretty printed in development and test
 */

import pino from 'pino'
import { PINO_REDACT_PATHS } from './masking.js'

/** Logger configuration options */
export interface LoggerOptions {
  level?: string
  name?: string
  pretty?: boolean
}

const STDERR_FD = 2

/** Loggers created without an explicit level; setLogLevel() retunes them */
const managedLoggers = new Set<pino.Logger>()
let levelOverride: string | undefined

/** Default log level based on environment */
function getDefaultLogLevel(): string {
  if (levelOverride !== undefined) return levelOverride
  const envLevel = process.env.LOG_LEVEL
  if (envLevel) return envLevel
  if (process.env.NODE_ENV === 'production') return 'info'
  if (process.env.NODE_ENV === 'test' || process.env.NODE_ENV === 'development') return 'debug'
  // plain CLI use
  return 'warn'
}

/** Whether to use pretty printing (development mode) */
function isPrettyMode(): boolean {
  if (process.env.LOG_PRETTY !== undefined) {
    return process.env.LOG_PRETTY === 'true'
  }
  // pino-pretty runs in a worker thread; keep it out of CLI and production use
  return process.env.NODE_ENV === 'development' || process.env.NODE_ENV === 'test'
}

/**
 * Create a named logger instance
 * @param name - Logger name (module identifier)
 * @param options - Optional logger configuration overrides
 */
export function createLogger(
  name: string,
  options: LoggerOptions = {}
): pino.Logger {
  const level = options.level ?? getDefaultLogLevel()
  const managed = options.level === undefined
  const pretty = options.pretty ?? isPrettyMode()

  const baseOptions: pino.LoggerOptions = {
    name: options.name ?? name,
    level,
    redact: PINO_REDACT_PATHS,
    formatters: {
      level(label) {
        return { level: label }
      },
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    base: {
      pid: process.pid,
    },
  }

  // pino-pretty is a devDependency
  const instance = pretty
    ? pino({
        ...baseOptions,
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
    : pino(baseOptions, pino.destination({ fd: STDERR_FD, sync: true }))

  if (managed) managedLoggers.add(instance)
  return instance
}

/**
 * Set the level of every logger created without an explicit level, and of
 * those created later.
 */
export function setLogLevel(level: string): void {
  levelOverride = level
  for (const instance of managedLoggers) instance.level = level
}

/** Root application logger */
export const logger = createLogger('waymark')

/** Create a child logger with additional context */
export function childLogger(
  parent: pino.Logger,
  bindings: Record<string, unknown>
): pino.Logger {
  return parent.child(bindings)
}
