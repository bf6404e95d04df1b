/**
 * Structured logging: one JSON object per line.
 *
 * debug/info go to stdout, warn/error to stderr. Every entry carries
 * ts, level and event; callers add their own fields.
 */

import type { LogLevel } from '@geomesh/config'

export type LogFields = Record<string, unknown>

export interface Logger {
  debug(event: string, fields?: LogFields): void
  info(event: string, fields?: LogFields): void
  warn(event: string, fields?: LogFields): void
  error(event: string, fields?: LogFields): void
}

export interface LogSink {
  out(line: string): void
  err(line: string): void
}

const processSink: LogSink = {
  out: (line) => { process.stdout.write(line) },
  err: (line) => { process.stderr.write(line) },
}

const SEVERITY: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
}

type EntryLevel = Exclude<LogLevel, 'silent'>

export function createLogger(level: LogLevel = 'info', sink: LogSink = processSink): Logger {
  const write = (entryLevel: EntryLevel, event: string, fields: LogFields = {}): void => {
    if (SEVERITY[entryLevel] < SEVERITY[level]) return
    const line = JSON.stringify({ ts: new Date().toISOString(), level: entryLevel, event, ...fields }) + '\n'
    if (entryLevel === 'warn' || entryLevel === 'error') sink.err(line)
    else sink.out(line)
  }

  return {
    debug: (event, fields) => write('debug', event, fields),
    info: (event, fields) => write('info', event, fields),
    warn: (event, fields) => write('warn', event, fields),
    error: (event, fields) => write('error', event, fields),
  }
}

export const silentLogger: Logger = createLogger('silent')
