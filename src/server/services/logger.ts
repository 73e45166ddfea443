import type { LogLevel } from './types'

export type LogFields = Record<string, unknown>

export interface Logger {
  info(message: string, fields?: LogFields): void
  success(message: string, fields?: LogFields): void
  warn(message: string, fields?: LogFields): void
  error(message: string, fields?: LogFields): void
}

function formatValue(value: unknown): string {
  if (value instanceof Error) return JSON.stringify(value.message)
  if (typeof value === 'string') return /\s/.test(value) ? JSON.stringify(value) : value
  return JSON.stringify(value)
}

export function formatFields(fields?: LogFields): string {
  if (!fields) return ''
  const parts = Object.entries(fields)
    .filter(([, value]) => value !== undefined)
    .map(([key, value]) => `${key}=${formatValue(value)}`)
  return parts.length > 0 ? ` ${parts.join(' ')}` : ''
}

// Scoped console logger, e.g. "[HostController] ports ensured node=abc"
export function createLogger(scope: string): Logger {
  const write = (level: LogLevel, message: string, fields?: LogFields) => {
    const line = `[${scope}] ${message}${formatFields(fields)}`
    if (level === 'error') {
      console.error(line)
    } else if (level === 'warn') {
      console.warn(line)
    } else {
      console.log(line)
    }
  }

  return {
    info: (message, fields) => write('info', message, fields),
    success: (message, fields) => write('success', message, fields),
    warn: (message, fields) => write('warn', message, fields),
    error: (message, fields) => write('error', message, fields),
  }
}

// Logger that discards everything, for tests
export const silentLogger: Logger = {
  info: () => {},
  success: () => {},
  warn: () => {},
  error: () => {},
}
