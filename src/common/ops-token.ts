import { UnauthorizedException } from '@nestjs/common'
import { Request } from 'express'
import { firstHeader } from '../logging/http-context.middleware'

export function assertOpsToken(req: Pick<Request, 'headers'>): void {
  const requiredToken = process.env.HEALTH_METRICS_AUTH_TOKEN
  if (!requiredToken) {
    return
  }
  const authorization = firstHeader(req, 'authorization')
  const bearer =
    authorization && authorization.toLowerCase().startsWith('bearer ')
      ? authorization.slice(7).trim()
      : undefined
  const presented = bearer || firstHeader(req, 'x-ops-token')
  if (presented !== requiredToken) {
    throw new UnauthorizedException()
  }
}
