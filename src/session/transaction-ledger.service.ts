import { Injectable, Logger } from '@nestjs/common'
import {
  ChargingStore,
  NewMeterSample,
  SessionRecord,
  StorageFailure,
} from '../persistence/charging-store'
import type { MeterSampleInput, Verdict } from './session.types'

export type ActiveSession = {
  sessionId: number
  transactionId: number
  chargePointId: string
  connectorId: number
  idTag: string
  meterStart: number
  startedAt: Date
}

export type BeginRequest = {
  chargePointId: string
  connectorId: number
  idTag: string
  verdict: Verdict
  meterStart: number
  startedAt: Date
  reservationId?: number
}

export type BeginResult =
  | { status: 'started'; session: ActiveSession }
  | { status: 'not-authorized'; verdict: Verdict }
  | { status: 'connector-busy'; activeTransactionId: number | null }
  | { status: 'storage-failure'; error: StorageFailure }

export type CompleteRequest = {
  chargePointId: string
  transactionId: number
  meterStop: number
  stoppedAt: Date
  reason?: string
  stopIdTag?: string
}

export type CompletedSession = ActiveSession & {
  meterStop: number
  stoppedAt: Date
  reason?: string
}

export type CompleteResult =
  | { status: 'completed'; session: CompletedSession }
  | { status: 'not-found' }
  | { status: 'storage-failure'; error: StorageFailure }

export type SampleAttribution = {
  transactionId: number | null
  orphaned: boolean
  stored: number
}

/** A reserved slot has no transaction id until its session row is written. */
type Slot = { state: 'reserved' } | { state: 'active'; session: ActiveSession }

type ChargePointLedger = {
  connectors: Map<number, Slot>
}

/**
 * Per (charge point, connector) transaction state. A connector is Idle when it
 * has no slot, Active when it holds a session.
 */
@Injectable()
export class TransactionLedger {
  private readonly logger = new Logger(TransactionLedger.name)
  private readonly ledgers = new Map<string, ChargePointLedger>()
  private readonly loading = new Map<string, Promise<ChargePointLedger>>()
  private lastTransactionId: Promise<number> | null = null

  constructor(private readonly store: ChargingStore) {}

  /** Loads Active sessions for the charge point from storage once per process. */
  async hydrate(chargePointId: string): Promise<void> {
    await this.ledgerFor(chargePointId)
  }

  async activeSessions(chargePointId: string): Promise<ActiveSession[]> {
    const ledger = await this.ledgerFor(chargePointId)
    const sessions: ActiveSession[] = []
    for (const slot of ledger.connectors.values()) {
      if (slot.state === 'active') {
        sessions.push(slot.session)
      }
    }
    return sessions.sort((a, b) => a.connectorId - b.connectorId)
  }

  async activeFor(chargePointId: string, connectorId: number): Promise<ActiveSession | null> {
    const slot = (await this.ledgerFor(chargePointId)).connectors.get(connectorId)
    return slot?.state === 'active' ? slot.session : null
  }

  async findActive(chargePointId: string, transactionId: number): Promise<ActiveSession | null> {
    const ledger = await this.ledgerFor(chargePointId)
    return findByTransactionId(ledger, transactionId)?.session ?? null
  }

  async begin(request: BeginRequest): Promise<BeginResult> {
    if (request.verdict !== 'Accepted') {
      return { status: 'not-authorized', verdict: request.verdict }
    }

    let ledger: ChargePointLedger
    try {
      ledger = await this.ledgerFor(request.chargePointId)
    } catch (error) {
      if (error instanceof StorageFailure) {
        return { status: 'storage-failure', error }
      }
      throw error
    }
    const existing = ledger.connectors.get(request.connectorId)
    if (existing) {
      return {
        status: 'connector-busy',
        activeTransactionId: existing.state === 'active' ? existing.session.transactionId : null,
      }
    }
    ledger.connectors.set(request.connectorId, { state: 'reserved' })

    try {
      const transactionId = await this.nextTransactionId()
      const record = await this.store.insertSession({
        transactionId,
        chargePointId: request.chargePointId,
        connectorId: request.connectorId,
        idTag: request.idTag,
        meterStart: request.meterStart,
        startedAt: request.startedAt,
        reservationId: request.reservationId,
      })
      const session = toActiveSession(record)
      ledger.connectors.set(request.connectorId, { state: 'active', session })
      return { status: 'started', session }
    } catch (error) {
      ledger.connectors.delete(request.connectorId)
      if (error instanceof StorageFailure) {
        this.logger.error(
          `Start on ${request.chargePointId}/${request.connectorId} rolled back: ${error.message}`
        )
        return { status: 'storage-failure', error }
      }
      throw error
    }
  }

  async complete(request: CompleteRequest): Promise<CompleteResult> {
    const ledger = await this.ledgerFor(request.chargePointId)
    const match = findByTransactionId(ledger, request.transactionId)
    if (!match) {
      return { status: 'not-found' }
    }

    const { session, connectorId } = match
    let meterStop = request.meterStop
    if (meterStop < session.meterStart) {
      this.logger.warn(
        `Transaction ${session.transactionId} reported meterStop ${meterStop} below meterStart ${session.meterStart}; recording meterStart`
      )
      meterStop = session.meterStart
    }

    ledger.connectors.delete(connectorId)
    try {
      await this.store.completeSession(session.transactionId, {
        meterStop,
        stoppedAt: request.stoppedAt,
        stopReason: request.reason,
        stopIdTag: request.stopIdTag,
      })
    } catch (error) {
      ledger.connectors.set(connectorId, { state: 'active', session })
      if (error instanceof StorageFailure) {
        this.logger.error(`Stop of transaction ${session.transactionId} rolled back: ${error.message}`)
        return { status: 'storage-failure', error }
      }
      throw error
    }

    return {
      status: 'completed',
      session: { ...session, meterStop, stoppedAt: request.stoppedAt, reason: request.reason },
    }
  }

  /**
   * Persists samples against the connector's Active session, or as orphaned
   * samples when the connector is Idle.
   */
  async recordSamples(
    chargePointId: string,
    connectorId: number,
    samples: MeterSampleInput[],
    reportedTransactionId?: number
  ): Promise<SampleAttribution> {
    const session = await this.activeFor(chargePointId, connectorId)
    if (session && reportedTransactionId !== undefined && reportedTransactionId !== session.transactionId) {
      this.logger.warn(
        `Meter values on ${chargePointId}/${connectorId} report transaction ${reportedTransactionId}; active is ${session.transactionId}`
      )
    }

    const rows: NewMeterSample[] = samples.map((sample) => ({
      ...sample,
      sessionId: session ? session.sessionId : null,
      chargePointId,
      connectorId,
      transactionId: session ? session.transactionId : (reportedTransactionId ?? null),
      orphaned: !session,
    }))
    await this.store.appendMeterSamples(rows)

    return {
      transactionId: session ? session.transactionId : null,
      orphaned: !session,
      stored: rows.length,
    }
  }

  private nextTransactionId(): Promise<number> {
    const previous = this.lastTransactionId ?? this.store.maxTransactionId()
    const next = previous.then((value) => value + 1)
    this.lastTransactionId = next
    // Re-seed from storage after a failed allocation.
    void next.catch(() => {
      if (this.lastTransactionId === next) {
        this.lastTransactionId = null
      }
    })
    return next
  }

  private ledgerFor(chargePointId: string): Promise<ChargePointLedger> {
    const existing = this.ledgers.get(chargePointId)
    if (existing) {
      return Promise.resolve(existing)
    }
    const pending = this.loading.get(chargePointId)
    if (pending) {
      return pending
    }

    const load = this.store
      .findActiveSessions(chargePointId)
      .then((records) => {
        const ledger: ChargePointLedger = { connectors: new Map() }
        for (const record of records) {
          const current = ledger.connectors.get(record.connectorId)
          if (current?.state === 'active') {
            this.logger.warn(
              `Multiple active sessions on ${chargePointId}/${record.connectorId}; keeping transaction ${record.transactionId}`
            )
          }
          ledger.connectors.set(record.connectorId, {
            state: 'active',
            session: toActiveSession(record),
          })
        }
        this.ledgers.set(chargePointId, ledger)
        return ledger
      })
      .finally(() => this.loading.delete(chargePointId))
    this.loading.set(chargePointId, load)
    return load
  }
}

function findByTransactionId(
  ledger: ChargePointLedger,
  transactionId: number
): { connectorId: number; session: ActiveSession } | null {
  for (const [connectorId, slot] of ledger.connectors) {
    if (slot.state === 'active' && slot.session.transactionId === transactionId) {
      return { connectorId, session: slot.session }
    }
  }
  return null
}

function toActiveSession(record: SessionRecord): ActiveSession {
  return {
    sessionId: record.id,
    transactionId: record.transactionId,
    chargePointId: record.chargePointId,
    connectorId: record.connectorId,
    idTag: record.idTag,
    meterStart: record.meterStart,
    startedAt: record.startedAt,
  }
}
