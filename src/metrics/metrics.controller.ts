import { Controller, Get, Req } from '@nestjs/common'
import { Request } from 'express'
import { assertOpsToken } from '../common/ops-token'
import { MetricsService, MetricsSnapshot } from './metrics.service'

@Controller('metrics')
export class MetricsController {
  constructor(private readonly metrics: MetricsService) {}

  @Get()
  getMetrics(@Req() req: Request): MetricsSnapshot {
    assertOpsToken(req)
    return this.metrics.snapshot()
  }
}
