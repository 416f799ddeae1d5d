import { Injectable } from '@nestjs/common'
import { AsyncLocalStorage } from 'async_hooks'

export type LogContext = {
  correlationId?: string
  connectionId?: string
  chargePointId?: string
  action?: string
  messageId?: string
  commandId?: string
  transactionId?: number
  ip?: string
  path?: string
  method?: string
}

@Injectable()
export class LogContextService {
  private static storage = new AsyncLocalStorage<LogContext>()

  runWithContext<T>(context: LogContext, fn: () => T): T {
    return LogContextService.storage.run({ ...this.getContext(), ...context }, fn)
  }

  setContext(context: LogContext): void {
    LogContextService.storage.enterWith({ ...this.getContext(), ...context })
  }

  getContext(): LogContext {
    return LogContextService.storage.getStore() || {}
  }
}
