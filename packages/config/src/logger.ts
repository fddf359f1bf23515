/**
 * Structured logging.
 *
 * Emits one JSON line per record with `ts`, `level`, `scope`, `msg` and any
 * extra fields. Compatible with any log aggregator that reads JSON from
 * stdout.
 */

import { getConfig, type LogThreshold } from './env.js'

export type LogLevel = Exclude<LogThreshold, 'silent'>

export type LogFields = Record<string, unknown>

export interface Logger {
  readonly scope: string
  debug(msg: string, fields?: LogFields): void
  info(msg: string, fields?: LogFields): void
  warn(msg: string, fields?: LogFields): void
  error(msg: string, fields?: LogFields): void
  /** Logger sharing this one's sink and level, scoped as `parent:scope`. */
  child(scope: string): Logger
}

export interface LoggerOptions {
  /** Lowest level written. Defaults to the configured `SLICEWISE_LOG_LEVEL`. */
  level?: LogThreshold
  /** Receives each serialised line, newline included. Defaults to stdout. */
  write?: (line: string) => void
  now?: () => Date
}

const RANK: Record<LogThreshold, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: Number.POSITIVE_INFINITY,
}

function writeStdout(line: string): void {
  process.stdout.write(line)
}

export function createLogger(scope: string, options: LoggerOptions = {}): Logger {
  const level = options.level ?? getConfig().logLevel
  const write = options.write ?? writeStdout
  const now = options.now ?? (() => new Date())

  const emit = (recordLevel: LogLevel, msg: string, fields?: LogFields): void => {
    if (RANK[recordLevel] < RANK[level]) return
    const header = {
      ts: now().toISOString(),
      level: recordLevel,
      scope,
      msg,
    }
    // header keys lead the line and cannot be overwritten by fields
    const entry = { ...header, ...fields, ...header }
    write(JSON.stringify(entry) + '\n')
  }

  return {
    scope,
    debug: (msg, fields) => emit('debug', msg, fields),
    info: (msg, fields) => emit('info', msg, fields),
    warn: (msg, fields) => emit('warn', msg, fields),
    error: (msg, fields) => emit('error', msg, fields),
    child: (childScope) => createLogger(`${scope}:${childScope}`, { level, write, now }),
  }
}
