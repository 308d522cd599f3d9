import pino, { type Logger } from 'pino'
import type { LogLevel } from './config.js'

export type { Logger }

export function createLogger(name: string, level: LogLevel = 'info'): Logger {
  return pino({
    name,
    level,
    timestamp: pino.stdTimeFunctions.isoTime,
    formatters: {
      level(label) {
        return { level: label }
      }
    },
    serializers: {
      err: pino.stdSerializers.err
    }
  })
}
