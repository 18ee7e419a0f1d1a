import pino from 'pino'

/**
 * Log levels:
 * - fatal (60): Unrecoverable failure
 * - error (50): Failed API operations
 * - warn (40): Unexpected but handled conditions
 * - info (30): Retries, document polling progress (default)
 * - debug (20): Request and response details
 * - trace (10): Wire-level details
 */

type Level = 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace'

const LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const

function isLevel(value: string): value is pino.LevelWithSilent {
  return LEVELS.some(level => level === value)
}

function parseLevel(value: string | undefined): pino.LevelWithSilent {
  const normalized = value?.trim().toLowerCase() ?? ''
  return isLevel(normalized) ? normalized : 'info'
}

const logLevel = parseLevel(process.env.LOG_LEVEL)

// Logs go to stderr so CLI output on stdout stays machine-readable
const baseLogger =
  logLevel === 'silent' || process.env.LOG_PRETTY === 'false'
    ? pino({ level: logLevel }, pino.destination(2))
    : pino({
        level: logLevel,
        transport: {
          target: 'pino-pretty',
          options: {
            destination: 2,
            colorize: true,
            translateTime: 'SYS:HH:MM:ss',
            ignore: 'pid,hostname',
            messageFormat: '{if context}[{context}] {end}{msg}',
            customColors: 'fatal:bgRed,error:red,warn:yellow,info:cyan,debug:green,trace:gray'
          }
        }
      })

type LogData = Record<string, unknown> | Error

type Logger = {
  [L in Level]: (message: string, data?: LogData) => void
} & {
  child: (bindings: pino.Bindings) => Logger
  isLevelEnabled: (level: Level) => boolean
}

/**
 * Wraps a pino logger so call sites pass the message first and structured
 * data second. Errors are logged under the `err` key to use pino's serializer.
 */
const createLoggerWrapper = (logger: pino.Logger): Logger => {
  const wrap = (level: Level) => {
    return (message: string, data?: LogData) => {
      if (data === undefined) {
        logger[level](message)
      } else if (data instanceof Error) {
        logger[level]({ err: data }, message)
      } else {
        logger[level](data, message)
      }
    }
  }

  return {
    fatal: wrap('fatal'),
    error: wrap('error'),
    warn: wrap('warn'),
    info: wrap('info'),
    debug: wrap('debug'),
    trace: wrap('trace'),
    child: (bindings: pino.Bindings) => createLoggerWrapper(logger.child(bindings)),
    isLevelEnabled: (level: Level) => logger.isLevelEnabled(level)
  }
}

/**
 * Root logger.
 *
 * ```typescript
 * import { log } from '@workspace/logger'
 *
 * log.info('Translating document', { documentId })
 * log.error('Request failed', error)
 * ```
 *
 * Set the level with `LOG_LEVEL=debug`; `LOG_LEVEL=silent` disables output.
 */
export const log = createLoggerWrapper(baseLogger)

/**
 * Create a child logger tagged with a context name
 *
 * @example
 * ```typescript
 * const executorLog = createLogger('RequestExecutor')
 * executorLog.info('Starting retry 1', { url })
 * ```
 */
export function createLogger(context: string): Logger {
  return createLoggerWrapper(baseLogger.child({ context }))
}

export function setLogLevel(level: pino.LevelWithSilent): void {
  baseLogger.level = level
}

export function getLogLevel(): string {
  return baseLogger.level
}

export type { Level, LogData, Logger }
