import { Controller, Get, NotFoundException, Param, Req } from '@nestjs/common'
import { Request } from 'express'
import { assertOpsToken } from '../common/ops-token'
import {
  ChargePointStatus,
  ChargePointSummary,
  SessionCoordinator,
} from '../session/session-coordinator.service'

@Controller('charge-points')
export class ChargePointsController {
  constructor(private readonly coordinator: SessionCoordinator) {}

  @Get()
  list(@Req() req: Request): Promise<ChargePointSummary[]> {
    assertOpsToken(req)
    return this.coordinator.listChargePoints()
  }

  @Get(':chargePointId')
  async get(
    @Req() req: Request,
    @Param('chargePointId') chargePointId: string
  ): Promise<ChargePointStatus> {
    assertOpsToken(req)
    const status = await this.coordinator.getChargePointStatus(chargePointId)
    if (!status) {
      throw new NotFoundException(`Unknown charge point ${chargePointId}`)
    }
    return status
  }
}
