import { Injectable, Logger } from '@nestjs/common'
import { MetricLabels, MetricsService } from '../metrics/metrics.service'
import { buildCallError, buildCallResult, OcppErrorCode, parseFrame } from './ocpp-envelope'
import { OcppResponseCache } from './response-cache.service'
import { OcppRequestTracker } from './request-tracker.service'
import { OcppSchemaValidator } from './schema-validator.service'
import { OcppContext, OcppHandlerResult } from './versions/ocpp-adapter.interface'
import { Ocpp16Adapter } from './versions/ocpp16.adapter'

/**
 * Handles one inbound frame: replies to CALLRESULT/CALLERROR go to the request
 * tracker, CALLs are validated and handed to the adapter. Returns the
 * serialized frame to send back, if any.
 */
@Injectable()
export class OcppService {
  private readonly logger = new Logger(OcppService.name)

  constructor(
    private readonly adapter: Ocpp16Adapter,
    private readonly validator: OcppSchemaValidator,
    private readonly responseCache: OcppResponseCache,
    private readonly requestTracker: OcppRequestTracker,
    private readonly metrics: MetricsService
  ) {}

  async handleIncoming(raw: string, context: OcppContext): Promise<string | null> {
    const parsed = parseFrame(raw)
    if (!parsed.ok) {
      this.logger.warn(`Unexpected OCPP frame: ${parsed.error.reason}`)
      this.metrics.increment('ocpp_schema_failures_total', {
        direction: 'inbound',
        phase: 'request',
        reason: 'envelope_invalid',
      })
      if (!parsed.error.callUniqueId) {
        return null
      }
      return this.callError(parsed.error.callUniqueId, 'FormationViolation', parsed.error.reason, {
        reason: parsed.error.reason,
      })
    }
    const frame = parsed.frame

    if (frame.type === 'result') {
      this.requestTracker.handleCallResult(context.chargePointId, frame.uniqueId, frame.payload)
      return null
    }
    if (frame.type === 'error') {
      this.requestTracker.handleCallError(
        context.chargePointId,
        frame.uniqueId,
        frame.errorCode,
        frame.errorDescription,
        frame.errorDetails
      )
      return null
    }

    const fingerprint = OcppResponseCache.fingerprint(frame.action, frame.payload)
    const cached = await this.responseCache.get(context.chargePointId, frame.uniqueId, fingerprint)
    if (cached) {
      this.metrics.increment('ocpp_replayed_responses_total', { action: frame.action })
      return cached
    }

    const inbound = this.validator.parseInbound(frame.action, frame.payload)
    if (!inbound.ok) {
      const reply =
        inbound.reason === 'unsupported'
          ? this.callError(
              frame.uniqueId,
              'NotImplemented',
              `Action ${frame.action} not supported`,
              {},
              frame.action
            )
          : this.callError(
              frame.uniqueId,
              'FormationViolation',
              'Payload validation failed',
              { errors: inbound.errors },
              frame.action
            )
      this.metrics.increment('ocpp_schema_failures_total', {
        direction: 'inbound',
        phase: 'request',
        action: frame.action,
        reason: inbound.reason === 'unsupported' ? 'schema_missing' : 'validation_failed',
      })
      await this.responseCache.set(context.chargePointId, frame.uniqueId, fingerprint, reply)
      return reply
    }

    const action = inbound.call.action
    let result: OcppHandlerResult
    try {
      result = await this.adapter.handleCall(inbound.call, context)
    } catch (error) {
      this.logger.error(
        `${action} from ${context.chargePointId} failed: ${
          error instanceof Error ? error.message : String(error)
        }`
      )
      return this.callError(frame.uniqueId, 'InternalError', `Failed to process ${action}`, {}, action)
    }

    if ('error' in result) {
      // Not cached: a retransmission should be processed again.
      return this.callError(
        frame.uniqueId,
        result.error.code,
        result.error.description,
        result.error.details ?? {},
        action
      )
    }

    const responseValidation = this.validator.validateResponse(action, result.response)
    if (!responseValidation.valid) {
      this.metrics.increment('ocpp_schema_failures_total', {
        direction: 'inbound',
        phase: 'response',
        action,
        reason: 'response_validation_failed',
      })
      return this.callError(
        frame.uniqueId,
        'InternalError',
        'Response validation failed',
        { errors: responseValidation.errors },
        action
      )
    }

    const reply = JSON.stringify(buildCallResult(frame.uniqueId, result.response))
    await this.responseCache.set(context.chargePointId, frame.uniqueId, fingerprint, reply)
    return reply
  }

  private callError(
    uniqueId: string,
    code: OcppErrorCode,
    description: string,
    details: Record<string, unknown> = {},
    action?: string
  ): string {
    const labels: MetricLabels = action ? { code, direction: 'inbound', action } : { code, direction: 'inbound' }
    this.metrics.increment('ocpp_error_codes_total', labels)
    this.metrics.observeRate('ocpp_error_rate_per_sec', labels)
    return JSON.stringify(buildCallError(uniqueId, code, description, details))
  }
}
