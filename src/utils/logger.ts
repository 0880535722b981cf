import { hostname } from 'node:os'
import pino from 'pino'
import type { Logger } from 'pino'

export const LOG_FILE = 'peppol_sync.log'

/**
 * Run log written as JSON lines. Writes are synchronous so the record of a
 * failing run is on disk before the process exits.
 */
export function createRunLogger(logPath: string): Logger {
  return pino(
    {
      base: {
        cwd: process.cwd(),
        host: hostname(),
        pid: process.pid,
        user: process.env.USER ?? process.env.USERNAME,
      },
      formatters: {
        level: (label) => ({ level: label }),
      },
      timestamp: pino.stdTimeFunctions.isoTime,
    },
    pino.destination({ append: true, dest: logPath, mkdir: true, sync: true }),
  )
}

/**
 * Logger that discards everything, for callers without a log file.
 */
export function createSilentLogger(): Logger {
  return pino({ level: 'silent' })
}
