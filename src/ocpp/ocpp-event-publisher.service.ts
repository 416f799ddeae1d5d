import { Injectable, Logger } from '@nestjs/common'
import { ConfigService } from '@nestjs/config'
import { randomUUID } from 'crypto'
import { KAFKA_TOPICS } from '../contracts/kafka-topics'
import { DomainEvent, SessionEventType, StationEventType } from '../contracts/events'
import { KafkaService } from '../kafka/kafka.service'
import { MetricsService } from '../metrics/metrics.service'

export type EventScope = {
  chargePointId: string
  connectorId?: number
  transactionId?: number
}

/**
 * Publishes station and session events. Delivery is best effort: a failed
 * publish is logged and counted, never raised to the caller.
 */
@Injectable()
export class OcppEventPublisher {
  private readonly logger = new Logger(OcppEventPublisher.name)
  private readonly source: string

  constructor(
    private readonly kafka: KafkaService,
    private readonly metrics: MetricsService,
    config: ConfigService
  ) {
    this.source = config.get<string>('service.name') || 'ocpp-central-system'
  }

  async publishStationEvent(
    eventType: StationEventType,
    scope: EventScope,
    payload?: Record<string, unknown>
  ): Promise<void> {
    await this.publish(KAFKA_TOPICS.stationEvents, this.buildEvent(eventType, scope, payload))
  }

  async publishSessionEvent(
    eventType: SessionEventType,
    scope: EventScope,
    payload?: Record<string, unknown>
  ): Promise<void> {
    await this.publish(KAFKA_TOPICS.sessionEvents, this.buildEvent(eventType, scope, payload))
  }

  private async publish(topic: string, event: DomainEvent): Promise<void> {
    try {
      await this.kafka.publish(topic, JSON.stringify(event), event.chargePointId)
    } catch (error) {
      this.metrics.increment('event_publish_failures_total', { topic })
      this.logger.warn(
        `Failed to publish ${event.eventType} for ${event.chargePointId}: ${
          error instanceof Error ? error.message : String(error)
        }`
      )
    }
  }

  private buildEvent(
    eventType: DomainEvent['eventType'],
    scope: EventScope,
    payload?: Record<string, unknown>
  ): DomainEvent {
    return {
      eventId: randomUUID(),
      eventType,
      source: this.source,
      occurredAt: new Date().toISOString(),
      chargePointId: scope.chargePointId,
      connectorId: scope.connectorId,
      transactionId: scope.transactionId,
      payload,
    }
  }
}
