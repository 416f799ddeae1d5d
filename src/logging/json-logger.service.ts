import { Injectable, LoggerService } from '@nestjs/common'
import { LogContextService } from './log-context.service'

type LogLevel = 'info' | 'error' | 'warn' | 'debug' | 'verbose'

@Injectable()
export class JsonLogger implements LoggerService {
  constructor(private readonly context: LogContextService) {}

  log(message: unknown, context?: string): void {
    this.write('info', message, context)
  }

  error(message: unknown, trace?: string, context?: string): void {
    this.write('error', message, context, trace)
  }

  warn(message: unknown, context?: string): void {
    this.write('warn', message, context)
  }

  debug(message: unknown, context?: string): void {
    this.write('debug', message, context)
  }

  verbose(message: unknown, context?: string): void {
    this.write('verbose', message, context)
  }

  private write(level: LogLevel, message: unknown, context?: string, trace?: string): void {
    const formatted = formatMessage(message)
    const entry: Record<string, unknown> = {
      timestamp: new Date().toISOString(),
      level,
      ...this.context.getContext(),
      message: formatted.message,
    }
    if (formatted.data !== undefined) {
      entry.data = formatted.data
    }
    if (context) {
      entry.context = context
    }
    if (trace) {
      entry.trace = trace
    }
    writeToConsole(JSON.stringify(entry), level)
  }
}

function writeToConsole(line: string, level: LogLevel): void {
  if (level === 'error') {
    // eslint-disable-next-line no-console
    console.error(line)
    return
  }
  // eslint-disable-next-line no-console
  console.log(line)
}

function formatMessage(message: unknown): { message: string; data?: unknown } {
  if (message instanceof Error) {
    return { message: message.message || 'Error', data: { stack: message.stack } }
  }
  if (typeof message === 'string') {
    return { message }
  }
  if (message && typeof message === 'object') {
    if ('message' in message && typeof message.message === 'string') {
      return { message: message.message, data: message }
    }
    return { message: 'log', data: message }
  }
  return { message: String(message) }
}
