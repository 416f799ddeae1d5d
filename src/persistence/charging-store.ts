import type {
  Availability,
  ConnectorStatus,
  Reachability,
  SessionStatus,
  TagStatus,
} from '../session/session.types'

export type BootInfo = {
  chargePointId: string
  vendor: string
  model: string
  firmwareVersion?: string
  chargePointSerialNumber?: string
  chargeBoxSerialNumber?: string
  iccid?: string
  imsi?: string
  meterType?: string
  meterSerialNumber?: string
}

export type ChargePointRecord = {
  chargePointId: string
  vendor: string
  model: string
  firmwareVersion: string | null
  chargePointSerialNumber: string | null
  chargeBoxSerialNumber: string | null
  iccid: string | null
  imsi: string | null
  meterType: string | null
  meterSerialNumber: string | null
  reachability: Reachability
  lastSeenAt: Date | null
}

export type ConnectorStatusUpdate = {
  chargePointId: string
  connectorId: number
  status: ConnectorStatus
  errorCode: string
  info?: string
  vendorId?: string
  vendorErrorCode?: string
  statusAt: Date
  availability: Availability
}

export type ConnectorRecord = {
  chargePointId: string
  connectorId: number
  status: ConnectorStatus | null
  errorCode: string | null
  info: string | null
  vendorErrorCode: string | null
  availability: Availability
  statusAt: Date | null
}

export type IdTagRecord = {
  tag: string
  status: TagStatus
  expiryDate: Date | null
  parentTag: string | null
}

export type NewSession = {
  transactionId: number
  chargePointId: string
  connectorId: number
  idTag: string
  meterStart: number
  startedAt: Date
  reservationId?: number
}

export type SessionStop = {
  meterStop: number
  stoppedAt: Date
  stopReason?: string
  stopIdTag?: string
}

export type SessionRecord = {
  id: number
  transactionId: number
  chargePointId: string
  connectorId: number
  idTag: string
  meterStart: number
  meterStop: number | null
  startedAt: Date
  stoppedAt: Date | null
  status: SessionStatus
  stopReason: string | null
  stopIdTag: string | null
  reservationId: number | null
}

export type NewMeterSample = {
  sessionId: number | null
  chargePointId: string
  connectorId: number
  transactionId: number | null
  orphaned: boolean
  sampledAt: Date
  value: number
  measurand: string
  unit: string
  phase?: string
  context?: string
  location?: string
}

export type ConfigurationEntry = {
  key: string
  value: string | null
  readonly: boolean
}

export type DataTransferInput = {
  chargePointId: string
  vendorId: string
  messageId?: string
  data?: string
  receivedAt: Date
}

/** Raised by every store operation that could not complete against the database. */
export class StorageFailure extends Error {
  constructor(
    readonly operation: string,
    cause: unknown
  ) {
    super(`Storage operation ${operation} failed: ${describe(cause)}`, { cause })
    this.name = 'StorageFailure'
  }
}

function describe(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause)
}

/**
 * Persistence boundary of the central system. Reads are idempotent and may be
 * retried; writes are not retried by the store.
 */
export abstract class ChargingStore {
  abstract upsertChargePoint(boot: BootInfo, seenAt: Date): Promise<ChargePointRecord>
  abstract getChargePoint(chargePointId: string): Promise<ChargePointRecord | null>
  abstract listChargePoints(): Promise<ChargePointRecord[]>
  abstract setReachability(
    chargePointId: string,
    reachability: Reachability,
    seenAt: Date
  ): Promise<void>
  abstract touchChargePoint(chargePointId: string, seenAt: Date): Promise<void>

  abstract upsertConnector(update: ConnectorStatusUpdate): Promise<void>
  abstract listConnectors(chargePointId: string): Promise<ConnectorRecord[]>
  /** `connectorId` 0 applies to every connector of the charge point. */
  abstract setConnectorAvailability(
    chargePointId: string,
    connectorId: number,
    availability: Availability
  ): Promise<void>

  abstract findIdTag(tag: string): Promise<IdTagRecord | null>

  abstract insertSession(session: NewSession): Promise<SessionRecord>
  abstract completeSession(transactionId: number, stop: SessionStop): Promise<void>
  abstract findSession(transactionId: number): Promise<SessionRecord | null>
  abstract findActiveSession(
    chargePointId: string,
    connectorId: number
  ): Promise<SessionRecord | null>
  abstract findActiveSessions(chargePointId: string): Promise<SessionRecord[]>
  abstract maxTransactionId(): Promise<number>

  abstract appendMeterSamples(samples: NewMeterSample[]): Promise<void>

  abstract saveConfiguration(chargePointId: string, entries: ConfigurationEntry[]): Promise<void>
  abstract recordDataTransfer(transfer: DataTransferInput): Promise<void>
}
