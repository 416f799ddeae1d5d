import { Module } from '@nestjs/common'
import { SessionModule } from '../session/session.module'
import { ChargePointsController } from './charge-points.controller'
import { CommandConsumerService } from './command-consumer.service'
import { CommandIdempotencyService } from './command-idempotency.service'

@Module({
  imports: [SessionModule],
  controllers: [ChargePointsController],
  providers: [CommandConsumerService, CommandIdempotencyService],
})
export class AdminModule {}
