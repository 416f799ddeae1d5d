import { Injectable, Logger } from '@nestjs/common'
import { ConfigService } from '@nestjs/config'
import { randomUUID } from 'crypto'
import { MetricsService } from '../metrics/metrics.service'
import type { ConnectionHandle } from '../session/session.types'
import { buildCall } from './ocpp-envelope'
import { OcppRequestTracker } from './request-tracker.service'
import { OcppSchemaValidator } from './schema-validator.service'
import type { OutboundAction, OutboundReplies, OutboundRequests } from './schemas/ocpp16.types'

export type CommandResult<A extends OutboundAction> =
  | { status: 'replied'; reply: OutboundReplies[A] }
  | {
      status: 'error'
      errorCode: string
      errorDescription: string
      errorDetails: Record<string, unknown>
    }
  | { status: 'timeout' }
  | { status: 'unreachable' }
  | { status: 'busy'; pendingAction: string }
  | { status: 'invalid'; reason: string; errors?: string[] }

/** Sends one CALL to a charge point and waits for its correlated reply. */
@Injectable()
export class OcppCommandDispatcher {
  private readonly logger = new Logger(OcppCommandDispatcher.name)
  private readonly defaultTimeoutMs: number

  constructor(
    private readonly validator: OcppSchemaValidator,
    private readonly tracker: OcppRequestTracker,
    private readonly metrics: MetricsService,
    config: ConfigService
  ) {
    this.defaultTimeoutMs = config.get<number>('ocpp.commandTimeoutMs') ?? 15000
  }

  async dispatch<A extends OutboundAction>(
    handle: ConnectionHandle,
    action: A,
    payload: OutboundRequests[A],
    timeoutMs = this.defaultTimeoutMs
  ): Promise<CommandResult<A>> {
    const validation = this.validator.validateCommand(action, payload)
    if (!validation.valid) {
      return { status: 'invalid', reason: `Payload invalid for ${action}`, errors: validation.errors }
    }

    const uniqueId = randomUUID()
    const registration = this.tracker.register(handle.chargePointId, uniqueId, action, timeoutMs)
    if (registration.status === 'busy') {
      this.metrics.increment('ocpp_commands_total', { action, outcome: 'busy' })
      return { status: 'busy', pendingAction: registration.pendingAction }
    }

    try {
      handle.send(JSON.stringify(buildCall(uniqueId, action, payload)))
    } catch (error) {
      this.tracker.release(uniqueId)
      this.logger.warn(
        `Failed to send ${action} to ${handle.chargePointId}: ${
          error instanceof Error ? error.message : String(error)
        }`
      )
      this.metrics.increment('ocpp_commands_total', { action, outcome: 'unreachable' })
      return { status: 'unreachable' }
    }

    const reply = await registration.reply
    this.metrics.increment('ocpp_commands_total', { action, outcome: reply.status })
    switch (reply.status) {
      case 'timeout':
        return { status: 'timeout' }
      case 'error':
        return {
          status: 'error',
          errorCode: reply.errorCode,
          errorDescription: reply.errorDescription,
          errorDetails: reply.errorDetails,
        }
      case 'result': {
        const parsed = this.validator.parseReply(action, reply.payload)
        if (!parsed.ok) {
          this.metrics.increment('ocpp_schema_failures_total', {
            direction: 'outbound',
            phase: 'response',
            action,
            reason: 'response_validation_failed',
          })
          return {
            status: 'error',
            errorCode: 'ResponseValidationFailed',
            errorDescription: 'Invalid response payload',
            errorDetails: { errors: parsed.errors },
          }
        }
        return { status: 'replied', reply: parsed.reply }
      }
    }
  }
}
