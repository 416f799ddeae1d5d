import type { BootInfo } from '../persistence/charging-store'
import type { CompletedSession, SampleAttribution } from './transaction-ledger.service'
import type { Authorization, ConnectorStatus, MeterSampleInput } from './session.types'

/** Charge point requests, decoded from the wire into domain values. */
export type InboundMessage =
  | ({ kind: 'BootNotification' } & BootInfo)
  | { kind: 'Heartbeat'; chargePointId: string }
  | { kind: 'Authorize'; chargePointId: string; idTag: string }
  | {
      kind: 'StatusNotification'
      chargePointId: string
      connectorId: number
      status: ConnectorStatus
      errorCode: string
      info?: string
      vendorId?: string
      vendorErrorCode?: string
      timestamp?: Date
    }
  | {
      kind: 'StartTransaction'
      chargePointId: string
      connectorId: number
      idTag: string
      meterStart: number
      timestamp: Date
      reservationId?: number
    }
  | {
      kind: 'StopTransaction'
      chargePointId: string
      transactionId: number
      meterStop: number
      timestamp: Date
      idTag?: string
      reason?: string
      samples: MeterSampleInput[]
    }
  | {
      kind: 'MeterValues'
      chargePointId: string
      connectorId: number
      transactionId?: number
      samples: MeterSampleInput[]
    }
  | {
      kind: 'DataTransfer'
      chargePointId: string
      vendorId: string
      messageId?: string
      data?: string
    }

export type InboundKind = InboundMessage['kind']

export type MessageOf<K extends InboundKind> = Extract<InboundMessage, { kind: K }>

export type StartRejection = 'NotAuthorized' | 'ConnectorBusy' | 'StorageFailure'

export type InboundResult =
  | { kind: 'BootNotification'; status: 'Accepted'; currentTime: Date; interval: number }
  | { kind: 'Heartbeat'; currentTime: Date }
  | { kind: 'Authorize'; authorization: Authorization }
  | { kind: 'StatusNotification' }
  | {
      kind: 'StartTransaction'
      outcome: 'accepted'
      transactionId: number
      authorization: Authorization
    }
  | {
      kind: 'StartTransaction'
      outcome: 'rejected'
      reason: StartRejection
      authorization: Authorization
    }
  | {
      kind: 'StopTransaction'
      outcome: 'completed'
      session: CompletedSession
      authorization?: Authorization
    }
  | { kind: 'StopTransaction'; outcome: 'not-found'; authorization?: Authorization }
  | { kind: 'MeterValues'; attribution: SampleAttribution }
  | { kind: 'DataTransfer'; status: 'Accepted' }

export type ResultOf<K extends InboundKind> = Extract<InboundResult, { kind: K }>
