import process from 'node:process'
import pino, {type Logger} from 'pino'

export type {Logger} from 'pino'

/**
 * Structured JSON logger used when the caller does not bring its own.
 * The level falls back to `LOG_LEVEL`, then `info`.
 */
export function createLogger(options: {level?: string} = {}): Logger {
  return pino({name: 'podrun', level: options.level ?? process.env.LOG_LEVEL ?? 'info'})
}
