import { Module } from '@nestjs/common'
import { OcppCommandDispatcher } from '../ocpp/command-dispatcher.service'
import { OcppEventPublisher } from '../ocpp/ocpp-event-publisher.service'
import { OcppRequestTracker } from '../ocpp/request-tracker.service'
import { OcppSchemaValidator } from '../ocpp/schema-validator.service'
import { AuthorizationCache } from './authorization-cache.service'
import { ConnectionRegistry } from './connection-registry.service'
import { LivenessMonitor } from './liveness-monitor.service'
import { SessionCoordinator } from './session-coordinator.service'
import { TransactionLedger } from './transaction-ledger.service'

@Module({
  providers: [
    ConnectionRegistry,
    AuthorizationCache,
    TransactionLedger,
    SessionCoordinator,
    LivenessMonitor,
    OcppSchemaValidator,
    OcppRequestTracker,
    OcppCommandDispatcher,
    OcppEventPublisher,
  ],
  exports: [
    SessionCoordinator,
    ConnectionRegistry,
    OcppSchemaValidator,
    OcppRequestTracker,
    OcppEventPublisher,
  ],
})
export class SessionModule {}
