import { Module } from '@nestjs/common'
import { SessionModule } from '../session/session.module'
import { OcppGateway } from './ocpp.gateway'
import { OcppService } from './ocpp.service'
import { OcppResponseCache } from './response-cache.service'
import { Ocpp16Adapter } from './versions/ocpp16.adapter'

@Module({
  imports: [SessionModule],
  providers: [OcppGateway, OcppService, OcppResponseCache, Ocpp16Adapter],
})
export class OcppModule {}
