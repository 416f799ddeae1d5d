import { Injectable, Logger, OnModuleDestroy, OnModuleInit } from '@nestjs/common'
import { ConfigService } from '@nestjs/config'
import { randomUUID } from 'crypto'
import { AdminCommand, parseAdminCommand } from '../contracts/commands'
import { CommandEventType, DomainEvent } from '../contracts/events'
import { KAFKA_TOPICS } from '../contracts/kafka-topics'
import { KafkaService } from '../kafka/kafka.service'
import { LogContextService } from '../logging/log-context.service'
import { MetricsService } from '../metrics/metrics.service'
import { CommandResult } from '../ocpp/command-dispatcher.service'
import type { OutboundAction } from '../ocpp/schemas/ocpp16.types'
import { KeyedMutex } from '../session/keyed-mutex'
import { CommandOptions, SessionCoordinator } from '../session/session-coordinator.service'
import { CommandIdempotencyService } from './command-idempotency.service'

type CommandIdentity = {
  commandId?: string
  chargePointId?: string
  commandType?: string
}

type CommandOutcome = {
  eventType: CommandEventType
  error?: string
  response?: unknown
}

/**
 * Consumes administrative commands from Kafka, runs them through the session
 * coordinator and reports each outcome on the command events topic.
 *
 * A message is done once its command is claimed and dispatched. The device
 * round trip runs in a lane per charge point, so a silent charge point holds
 * up only its own later commands.
 */
@Injectable()
export class CommandConsumerService implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(CommandConsumerService.name)
  private readonly source: string
  private readonly partitionsConsumedConcurrently: number
  private readonly lanes = new KeyedMutex()
  private readonly inFlight = new Set<Promise<void>>()

  constructor(
    private readonly kafka: KafkaService,
    private readonly coordinator: SessionCoordinator,
    private readonly idempotency: CommandIdempotencyService,
    private readonly metrics: MetricsService,
    private readonly logContext: LogContextService,
    config: ConfigService
  ) {
    this.source = config.get<string>('service.name') || 'ocpp-central-system'
    this.partitionsConsumedConcurrently = Math.max(
      1,
      config.get<number>('commands.partitionsConsumedConcurrently') ?? 4
    )
  }

  async onModuleInit(): Promise<void> {
    if (!this.kafka.isEnabled()) {
      this.logger.warn('Kafka disabled; command consumer not started')
      return
    }
    const consumer = await this.kafka.getConsumer()
    await consumer.subscribe({ topic: KAFKA_TOPICS.commandRequests })
    await consumer.run({
      partitionsConsumedConcurrently: this.partitionsConsumedConcurrently,
      eachMessage: async ({ message }) => {
        await this.handleMessage(message.value?.toString() || '')
      },
    })
    this.logger.log(`Consuming commands from ${KAFKA_TOPICS.commandRequests}`)
  }

  async onModuleDestroy(): Promise<void> {
    await this.drain()
  }

  /** Resolves once every dispatched command has reported its outcome. */
  async drain(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.all(this.inFlight)
    }
  }

  async handleMessage(raw: string): Promise<void> {
    if (!raw) return

    let decoded: unknown
    try {
      decoded = JSON.parse(raw)
    } catch {
      this.logger.warn('Invalid command payload: not JSON')
      return
    }

    const parsed = parseAdminCommand(decoded)
    if (!parsed.ok) {
      this.logger.warn(`Invalid command: ${parsed.error}`)
      if (parsed.commandId) {
        await this.publishCommandEvent(parsed, { eventType: 'CommandFailed', error: parsed.error })
      }
      return
    }

    const command = parsed.command
    await this.logContext.runWithContext(
      {
        correlationId: command.commandId,
        commandId: command.commandId,
        chargePointId: command.chargePointId,
      },
      async () => {
        const claimed = await this.idempotency.claim(command.commandId)
        if (!claimed) {
          this.logger.warn(`Duplicate command ${command.commandId} ignored`)
          this.metrics.increment('ocpp_command_duplicates_total')
          await this.publishCommandEvent(command, {
            eventType: 'CommandDuplicate',
            error: 'Duplicate commandId',
          })
          return
        }

        await this.publishCommandEvent(command, { eventType: 'CommandDispatched' })
        this.schedule(command)
      }
    )
  }

  private schedule(command: AdminCommand): void {
    const settled = this.lanes
      .runExclusive(command.chargePointId, () => this.complete(command))
      .catch((error: unknown) => {
        this.logger.error(
          `Command ${command.commandId} did not report: ${
            error instanceof Error ? error.message : String(error)
          }`
        )
      })
    this.inFlight.add(settled)
    void settled.then(() => this.inFlight.delete(settled))
  }

  private async complete(command: AdminCommand): Promise<void> {
    let outcome: CommandOutcome
    try {
      outcome = await this.execute(command)
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error)
      this.logger.error(`Command ${command.commandType} failed: ${reason}`)
      outcome = { eventType: 'CommandFailed', error: reason }
    }
    this.metrics.increment('admin_commands_total', {
      commandType: command.commandType,
      outcome: outcome.eventType,
    })
    await this.publishCommandEvent(command, outcome)
  }

  private async execute(command: AdminCommand): Promise<CommandOutcome> {
    const options: CommandOptions =
      command.timeoutSec !== undefined ? { timeoutMs: command.timeoutSec * 1000 } : {}
    const { chargePointId } = command
    switch (command.commandType) {
      case 'RemoteStart':
        return toOutcome(
          await this.coordinator.sendRemoteStart(
            chargePointId,
            command.idTag,
            command.connectorId,
            options
          )
        )
      case 'RemoteStop':
        return toOutcome(
          await this.coordinator.sendRemoteStop(chargePointId, command.transactionId, options)
        )
      case 'ChangeAvailability':
        return toOutcome(
          await this.coordinator.changeAvailability(
            chargePointId,
            command.connectorId,
            command.availability,
            options
          )
        )
      case 'Reset':
        return toOutcome(await this.coordinator.reset(chargePointId, command.resetType, options))
      case 'ChangeConfiguration':
        return toOutcome(
          await this.coordinator.changeConfiguration(
            chargePointId,
            command.key,
            command.value,
            options
          )
        )
      case 'GetConfiguration':
        return toOutcome(
          await this.coordinator.getConfiguration(chargePointId, command.keys, options)
        )
      case 'ClearCache':
        return toOutcome(await this.coordinator.clearCache(chargePointId, options))
      case 'GetStatus': {
        const status = await this.coordinator.getChargePointStatus(chargePointId)
        return status
          ? { eventType: 'CommandAccepted', response: status }
          : { eventType: 'CommandFailed', error: `Unknown charge point ${chargePointId}` }
      }
    }
  }

  private async publishCommandEvent(
    command: CommandIdentity,
    outcome: CommandOutcome
  ): Promise<void> {
    const event: DomainEvent = {
      eventId: randomUUID(),
      eventType: outcome.eventType,
      source: this.source,
      occurredAt: new Date().toISOString(),
      correlationId: command.commandId,
      chargePointId: command.chargePointId,
      payload: {
        commandId: command.commandId,
        commandType: command.commandType,
        error: outcome.error,
        response: outcome.response,
      },
    }
    try {
      await this.kafka.publish(
        KAFKA_TOPICS.commandEvents,
        JSON.stringify(event),
        command.chargePointId
      )
    } catch (error) {
      this.metrics.increment('event_publish_failures_total', { topic: KAFKA_TOPICS.commandEvents })
      this.logger.warn(
        `Failed to publish ${outcome.eventType} for ${command.commandId ?? '-'}: ${
          error instanceof Error ? error.message : String(error)
        }`
      )
    }
  }
}

/** Maps a coordinator command result to the event reported for it. */
export function toOutcome<A extends OutboundAction>(result: CommandResult<A>): CommandOutcome {
  switch (result.status) {
    case 'replied': {
      const reply: object = result.reply
      if ('status' in reply && reply.status === 'Rejected') {
        return { eventType: 'CommandRejected', error: 'Rejected by charge point', response: reply }
      }
      return { eventType: 'CommandAccepted', response: reply }
    }
    case 'error':
      return {
        eventType: result.errorCode === 'ResponseValidationFailed' ? 'CommandFailed' : 'CommandRejected',
        error: result.errorDescription,
        response: { errorCode: result.errorCode, errorDetails: result.errorDetails },
      }
    case 'timeout':
      return { eventType: 'CommandTimeout', error: 'No response from charge point' }
    case 'unreachable':
      return { eventType: 'CommandFailed', error: 'Charge point offline' }
    case 'busy':
      return {
        eventType: 'CommandFailed',
        error: `Charge point busy with ${result.pendingAction}`,
      }
    case 'invalid':
      return {
        eventType: 'CommandRejected',
        error: result.reason,
        response: result.errors ? { errors: result.errors } : undefined,
      }
  }
}
