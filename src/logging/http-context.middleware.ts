import { Injectable, NestMiddleware } from '@nestjs/common'
import { randomUUID } from 'crypto'
import { NextFunction, Request, Response } from 'express'
import { LogContextService } from './log-context.service'

const REQUEST_ID_HEADER = 'x-request-id'

@Injectable()
export class HttpContextMiddleware implements NestMiddleware {
  constructor(private readonly context: LogContextService) {}

  use(req: Request, res: Response, next: NextFunction): void {
    const requestId = firstHeader(req, REQUEST_ID_HEADER) ?? randomUUID()
    const ip = this.clientIp(req)

    this.context.runWithContext(
      { correlationId: requestId, ip, path: req.originalUrl || req.url, method: req.method },
      () => {
        res.setHeader(REQUEST_ID_HEADER, requestId)
        next()
      }
    )
  }

  private clientIp(req: Request): string {
    if ((process.env.HTTP_TRUST_PROXY ?? 'false') === 'true') {
      const forwarded = firstHeader(req, 'x-forwarded-for')
      if (forwarded) {
        return forwarded.split(',')[0].trim()
      }
    }
    return req.socket?.remoteAddress || 'unknown'
  }
}

export function firstHeader(req: Pick<Request, 'headers'>, name: string): string | undefined {
  const value = req.headers[name]
  const first = Array.isArray(value) ? value[0] : value
  const trimmed = first?.trim()
  return trimmed ? trimmed : undefined
}
