import {
  BootInfo,
  ChargePointRecord,
  ChargingStore,
  ConfigurationEntry,
  ConnectorRecord,
  ConnectorStatusUpdate,
  DataTransferInput,
  IdTagRecord,
  NewMeterSample,
  NewSession,
  SessionRecord,
  SessionStop,
  StorageFailure,
} from '../../src/persistence/charging-store'
import type { Availability, Reachability, TagStatus } from '../../src/session/session.types'

type TagOptions = {
  expiryDate?: Date
  parentTag?: string
}

/** ChargingStore over plain maps, with call counting and injectable failures. */
export class InMemoryChargingStore extends ChargingStore {
  readonly chargePoints = new Map<string, ChargePointRecord>()
  readonly connectors = new Map<string, ConnectorRecord>()
  readonly idTags = new Map<string, IdTagRecord>()
  readonly sessions: SessionRecord[] = []
  readonly meterSamples: NewMeterSample[] = []
  readonly configuration = new Map<string, Map<string, ConfigurationEntry>>()
  readonly dataTransfers: DataTransferInput[] = []
  private readonly calls = new Map<string, number>()
  private readonly failures = new Map<string, number>()

  seedTag(tag: string, status: TagStatus = 'Accepted', options: TagOptions = {}): void {
    this.idTags.set(tag, {
      tag,
      status,
      expiryDate: options.expiryDate ?? null,
      parentTag: options.parentTag ?? null,
    })
  }

  /** The next `times` calls of `operation` throw StorageFailure. */
  failNext(operation: string, times = 1): void {
    this.failures.set(operation, times)
  }

  callCount(operation: string): number {
    return this.calls.get(operation) ?? 0
  }

  session(transactionId: number): SessionRecord | undefined {
    return this.sessions.find((session) => session.transactionId === transactionId)
  }

  async upsertChargePoint(boot: BootInfo, seenAt: Date): Promise<ChargePointRecord> {
    return this.op('upsertChargePoint', () => {
      const record: ChargePointRecord = {
        chargePointId: boot.chargePointId,
        vendor: boot.vendor,
        model: boot.model,
        firmwareVersion: boot.firmwareVersion ?? null,
        chargePointSerialNumber: boot.chargePointSerialNumber ?? null,
        chargeBoxSerialNumber: boot.chargeBoxSerialNumber ?? null,
        iccid: boot.iccid ?? null,
        imsi: boot.imsi ?? null,
        meterType: boot.meterType ?? null,
        meterSerialNumber: boot.meterSerialNumber ?? null,
        reachability: 'Online',
        lastSeenAt: seenAt,
      }
      this.chargePoints.set(boot.chargePointId, record)
      return { ...record }
    })
  }

  async getChargePoint(chargePointId: string): Promise<ChargePointRecord | null> {
    return this.op('getChargePoint', () => {
      const record = this.chargePoints.get(chargePointId)
      return record ? { ...record } : null
    })
  }

  async listChargePoints(): Promise<ChargePointRecord[]> {
    return this.op('listChargePoints', () =>
      Array.from(this.chargePoints.values())
        .map((record) => ({ ...record }))
        .sort((a, b) => a.chargePointId.localeCompare(b.chargePointId))
    )
  }

  async setReachability(
    chargePointId: string,
    reachability: Reachability,
    seenAt: Date
  ): Promise<void> {
    return this.op('setReachability', () => {
      const record = this.chargePoints.get(chargePointId)
      if (record) {
        record.reachability = reachability
        record.lastSeenAt = seenAt
      }
    })
  }

  async touchChargePoint(chargePointId: string, seenAt: Date): Promise<void> {
    return this.op('touchChargePoint', () => {
      const record = this.chargePoints.get(chargePointId)
      if (record) {
        record.lastSeenAt = seenAt
      }
    })
  }

  async upsertConnector(update: ConnectorStatusUpdate): Promise<void> {
    return this.op('upsertConnector', () => {
      this.connectors.set(connectorKey(update.chargePointId, update.connectorId), {
        chargePointId: update.chargePointId,
        connectorId: update.connectorId,
        status: update.status,
        errorCode: update.errorCode,
        info: update.info ?? null,
        vendorErrorCode: update.vendorErrorCode ?? null,
        availability: update.availability,
        statusAt: update.statusAt,
      })
    })
  }

  async listConnectors(chargePointId: string): Promise<ConnectorRecord[]> {
    return this.op('listConnectors', () =>
      Array.from(this.connectors.values())
        .filter((connector) => connector.chargePointId === chargePointId)
        .map((connector) => ({ ...connector }))
        .sort((a, b) => a.connectorId - b.connectorId)
    )
  }

  async setConnectorAvailability(
    chargePointId: string,
    connectorId: number,
    availability: Availability
  ): Promise<void> {
    return this.op('setConnectorAvailability', () => {
      if (connectorId === 0) {
        for (const connector of this.connectors.values()) {
          if (connector.chargePointId === chargePointId) {
            connector.availability = availability
          }
        }
        return
      }
      const key = connectorKey(chargePointId, connectorId)
      const existing = this.connectors.get(key)
      if (existing) {
        existing.availability = availability
        return
      }
      this.connectors.set(key, {
        chargePointId,
        connectorId,
        status: null,
        errorCode: null,
        info: null,
        vendorErrorCode: null,
        availability,
        statusAt: null,
      })
    })
  }

  async findIdTag(tag: string): Promise<IdTagRecord | null> {
    return this.op('findIdTag', () => {
      const record = this.idTags.get(tag)
      return record ? { ...record } : null
    })
  }

  async insertSession(session: NewSession): Promise<SessionRecord> {
    return this.op('insertSession', () => {
      if (this.sessions.some((existing) => existing.transactionId === session.transactionId)) {
        throw new Error(`duplicate transaction id ${session.transactionId}`)
      }
      const busy = this.sessions.some(
        (existing) =>
          existing.status === 'Active' &&
          existing.chargePointId === session.chargePointId &&
          existing.connectorId === session.connectorId
      )
      if (busy) {
        throw new Error(`connector ${session.chargePointId}/${session.connectorId} has an active session`)
      }
      const record: SessionRecord = {
        id: this.sessions.length + 1,
        transactionId: session.transactionId,
        chargePointId: session.chargePointId,
        connectorId: session.connectorId,
        idTag: session.idTag,
        meterStart: session.meterStart,
        meterStop: null,
        startedAt: session.startedAt,
        stoppedAt: null,
        status: 'Active',
        stopReason: null,
        stopIdTag: null,
        reservationId: session.reservationId ?? null,
      }
      this.sessions.push(record)
      return { ...record }
    })
  }

  async completeSession(transactionId: number, stop: SessionStop): Promise<void> {
    return this.op('completeSession', () => {
      const session = this.sessions.find(
        (existing) => existing.transactionId === transactionId && existing.status === 'Active'
      )
      if (!session) {
        throw new Error(`no active session row for transaction ${transactionId}`)
      }
      session.status = 'Completed'
      session.meterStop = stop.meterStop
      session.stoppedAt = stop.stoppedAt
      session.stopReason = stop.stopReason ?? null
      session.stopIdTag = stop.stopIdTag ?? null
    })
  }

  async findSession(transactionId: number): Promise<SessionRecord | null> {
    return this.op('findSession', () => {
      const session = this.session(transactionId)
      return session ? { ...session } : null
    })
  }

  async findActiveSession(chargePointId: string, connectorId: number): Promise<SessionRecord | null> {
    return this.op('findActiveSession', () => {
      const session = this.sessions.find(
        (existing) =>
          existing.status === 'Active' &&
          existing.chargePointId === chargePointId &&
          existing.connectorId === connectorId
      )
      return session ? { ...session } : null
    })
  }

  async findActiveSessions(chargePointId: string): Promise<SessionRecord[]> {
    return this.op('findActiveSessions', () =>
      this.sessions
        .filter((session) => session.status === 'Active' && session.chargePointId === chargePointId)
        .map((session) => ({ ...session }))
    )
  }

  async maxTransactionId(): Promise<number> {
    return this.op('maxTransactionId', () =>
      this.sessions.reduce((max, session) => Math.max(max, session.transactionId), 0)
    )
  }

  async appendMeterSamples(samples: NewMeterSample[]): Promise<void> {
    return this.op('appendMeterSamples', () => {
      this.meterSamples.push(...samples)
    })
  }

  async saveConfiguration(chargePointId: string, entries: ConfigurationEntry[]): Promise<void> {
    return this.op('saveConfiguration', () => {
      const stored = this.configuration.get(chargePointId) ?? new Map<string, ConfigurationEntry>()
      for (const entry of entries) {
        stored.set(entry.key, { ...entry })
      }
      this.configuration.set(chargePointId, stored)
    })
  }

  async recordDataTransfer(transfer: DataTransferInput): Promise<void> {
    return this.op('recordDataTransfer', () => {
      this.dataTransfers.push({ ...transfer })
    })
  }

  private async op<T>(operation: string, fn: () => T): Promise<T> {
    this.calls.set(operation, this.callCount(operation) + 1)
    await Promise.resolve()
    const remaining = this.failures.get(operation) ?? 0
    if (remaining > 0) {
      this.failures.set(operation, remaining - 1)
      throw new StorageFailure(operation, new Error('injected failure'))
    }
    try {
      return fn()
    } catch (error) {
      throw new StorageFailure(operation, error)
    }
  }
}

function connectorKey(chargePointId: string, connectorId: number): string {
  return `${chargePointId}/${connectorId}`
}
