import { Injectable, Logger } from '@nestjs/common'
import { StorageFailure } from '../../persistence/charging-store'
import type { InboundMessage, InboundResult } from '../../session/inbound-message'
import { SessionCoordinator } from '../../session/session-coordinator.service'
import {
  DEFAULT_MEASURAND,
  DEFAULT_UNIT,
  type Authorization,
  type MeterSampleInput,
} from '../../session/session.types'
import type {
  IdTagInfo,
  InboundCall,
  InboundResponses,
  MeterValue,
} from '../schemas/ocpp16.types'
import { OcppAdapter, OcppContext, OcppHandlerResult } from './ocpp-adapter.interface'

type InboundResponse = InboundResponses[keyof InboundResponses]

/** Translates OCPP 1.6 payloads to coordinator messages and results back to payloads. */
@Injectable()
export class Ocpp16Adapter implements OcppAdapter {
  readonly version = '1.6'
  private readonly logger = new Logger(Ocpp16Adapter.name)

  constructor(private readonly coordinator: SessionCoordinator) {}

  async handleCall(call: InboundCall, context: OcppContext): Promise<OcppHandlerResult> {
    const message = this.toMessage(call, context.chargePointId)
    try {
      const result = await this.coordinator.dispatch(message)
      return { response: toResponse(result) }
    } catch (error) {
      if (error instanceof StorageFailure) {
        return {
          error: {
            code: 'InternalError',
            description: 'Storage unavailable',
            details: { operation: error.operation },
          },
        }
      }
      throw error
    }
  }

  private toMessage(call: InboundCall, chargePointId: string): InboundMessage {
    switch (call.action) {
      case 'BootNotification': {
        const boot = call.payload
        return {
          kind: 'BootNotification',
          chargePointId,
          vendor: boot.chargePointVendor,
          model: boot.chargePointModel,
          firmwareVersion: boot.firmwareVersion,
          chargePointSerialNumber: boot.chargePointSerialNumber,
          chargeBoxSerialNumber: boot.chargeBoxSerialNumber,
          iccid: boot.iccid,
          imsi: boot.imsi,
          meterType: boot.meterType,
          meterSerialNumber: boot.meterSerialNumber,
        }
      }
      case 'Heartbeat':
        return { kind: 'Heartbeat', chargePointId }
      case 'Authorize':
        return { kind: 'Authorize', chargePointId, idTag: call.payload.idTag }
      case 'StatusNotification': {
        const { timestamp, ...status } = call.payload
        return {
          kind: 'StatusNotification',
          chargePointId,
          ...status,
          timestamp: timestamp ? new Date(timestamp) : undefined,
        }
      }
      case 'StartTransaction':
        return {
          kind: 'StartTransaction',
          chargePointId,
          connectorId: call.payload.connectorId,
          idTag: call.payload.idTag,
          meterStart: call.payload.meterStart,
          timestamp: new Date(call.payload.timestamp),
          reservationId: call.payload.reservationId,
        }
      case 'StopTransaction':
        return {
          kind: 'StopTransaction',
          chargePointId,
          transactionId: call.payload.transactionId,
          meterStop: call.payload.meterStop,
          timestamp: new Date(call.payload.timestamp),
          idTag: call.payload.idTag,
          reason: call.payload.reason,
          samples: this.toSamples(chargePointId, call.payload.transactionData ?? []),
        }
      case 'MeterValues':
        return {
          kind: 'MeterValues',
          chargePointId,
          connectorId: call.payload.connectorId,
          transactionId: call.payload.transactionId,
          samples: this.toSamples(chargePointId, call.payload.meterValue),
        }
      case 'DataTransfer':
        return {
          kind: 'DataTransfer',
          chargePointId,
          vendorId: call.payload.vendorId,
          messageId: call.payload.messageId,
          data: call.payload.data,
        }
    }
  }

  /** Signed or otherwise non-numeric sampled values are skipped. */
  private toSamples(chargePointId: string, meterValues: MeterValue[]): MeterSampleInput[] {
    const samples: MeterSampleInput[] = []
    for (const meterValue of meterValues) {
      const sampledAt = new Date(meterValue.timestamp)
      for (const sampled of meterValue.sampledValue) {
        const value = Number(sampled.value)
        if (sampled.format === 'SignedData' || sampled.value.trim() === '' || !Number.isFinite(value)) {
          this.logger.debug(`Skipping non-numeric sampled value from ${chargePointId}`)
          continue
        }
        samples.push({
          sampledAt,
          value,
          measurand: sampled.measurand ?? DEFAULT_MEASURAND,
          unit: sampled.unit ?? DEFAULT_UNIT,
          phase: sampled.phase,
          context: sampled.context,
          location: sampled.location,
        })
      }
    }
    return samples
  }
}

export function toIdTagInfo(authorization: Authorization): IdTagInfo {
  const info: IdTagInfo = { status: authorization.verdict }
  if (authorization.expiryDate) {
    info.expiryDate = authorization.expiryDate.toISOString()
  }
  if (authorization.parentIdTag) {
    info.parentIdTag = authorization.parentIdTag
  }
  return info
}

export function toResponse(result: InboundResult): InboundResponse {
  switch (result.kind) {
    case 'BootNotification':
      return {
        status: result.status,
        currentTime: result.currentTime.toISOString(),
        interval: result.interval,
      }
    case 'Heartbeat':
      return { currentTime: result.currentTime.toISOString() }
    case 'Authorize':
      return { idTagInfo: toIdTagInfo(result.authorization) }
    case 'StatusNotification':
    case 'MeterValues':
      return {}
    case 'StartTransaction':
      if (result.outcome === 'accepted') {
        return {
          transactionId: result.transactionId,
          idTagInfo: toIdTagInfo(result.authorization),
        }
      }
      // A refused start carries no transaction id; 0 is never allocated.
      return {
        transactionId: 0,
        idTagInfo:
          result.reason === 'ConnectorBusy'
            ? { ...toIdTagInfo(result.authorization), status: 'ConcurrentTx' }
            : result.reason === 'StorageFailure'
              ? { status: 'Invalid' }
              : toIdTagInfo(result.authorization),
      }
    case 'StopTransaction':
      return result.authorization ? { idTagInfo: toIdTagInfo(result.authorization) } : {}
    case 'DataTransfer':
      return { status: result.status }
  }
}
