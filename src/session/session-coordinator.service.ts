import { Injectable, Logger } from '@nestjs/common'
import { ConfigService } from '@nestjs/config'
import { MetricsService } from '../metrics/metrics.service'
import { CommandResult, OcppCommandDispatcher } from '../ocpp/command-dispatcher.service'
import { OcppEventPublisher } from '../ocpp/ocpp-event-publisher.service'
import type { AvailabilityType, OutboundReplies, ResetType } from '../ocpp/schemas/ocpp16.types'
import {
  ChargePointRecord,
  ChargingStore,
  ConfigurationEntry,
  ConnectorRecord,
  StorageFailure,
} from '../persistence/charging-store'
import { AuthorizationCache } from './authorization-cache.service'
import { ConnectionRegistry } from './connection-registry.service'
import type { InboundMessage, InboundResult, MessageOf, ResultOf } from './inbound-message'
import { KeyedMutex } from './keyed-mutex'
import { ActiveSession, TransactionLedger } from './transaction-ledger.service'
import type { Authorization, ConnectionHandle, Reachability } from './session.types'

export type CommandOptions = {
  timeoutMs?: number
}

export type ChargePointStatus = {
  chargePointId: string
  reachability: Reachability
  connected: boolean
  connectedAt: Date | null
  lastActivityAt: Date | null
  record: ChargePointRecord | null
  connectors: ConnectorRecord[]
  activeSessions: ActiveSession[]
}

export type ChargePointSummary = {
  chargePointId: string
  vendor: string | null
  model: string | null
  reachability: Reachability
  connected: boolean
  lastSeenAt: Date | null
}

/**
 * Single writer of the connection registry and the transaction ledger. Work
 * for one charge point runs in that charge point's exclusive section; no
 * section is held while waiting on a device reply.
 */
@Injectable()
export class SessionCoordinator {
  private readonly logger = new Logger(SessionCoordinator.name)
  private readonly lock = new KeyedMutex()
  private readonly online = new Set<string>()
  private readonly heartbeatIntervalSeconds: number

  constructor(
    private readonly registry: ConnectionRegistry,
    private readonly authorizations: AuthorizationCache,
    private readonly ledger: TransactionLedger,
    private readonly store: ChargingStore,
    private readonly dispatcher: OcppCommandDispatcher,
    private readonly events: OcppEventPublisher,
    private readonly metrics: MetricsService,
    config: ConfigService
  ) {
    this.heartbeatIntervalSeconds = config.get<number>('ocpp.heartbeatIntervalSeconds') ?? 300
  }

  async onConnect(handle: ConnectionHandle, now = new Date()): Promise<void> {
    await this.lock.runExclusive(handle.chargePointId, async () => {
      const superseded = this.registry.register(handle, now.getTime())
      if (superseded) {
        this.logger.warn(
          `Connection ${handle.connectionId} superseded ${superseded.connectionId} for ${handle.chargePointId}`
        )
        this.metrics.increment('ocpp_connections_superseded_total')
      }
      this.metrics.setGauge('ocpp_connections_active', this.registry.size())
      await this.markOnline(handle.chargePointId, now)
    })
  }

  async onDisconnect(handle: ConnectionHandle, now = new Date()): Promise<void> {
    await this.lock.runExclusive(handle.chargePointId, async () => {
      if (!this.registry.unregister(handle.chargePointId, handle)) {
        return
      }
      this.metrics.setGauge('ocpp_connections_active', this.registry.size())
      await this.markOffline(handle.chargePointId, now, 'disconnected')
    })
  }

  /**
   * Demotes a charge point whose last activity is older than `deadlineMs`.
   * Returns false when fresh traffic or a newer connection arrived first.
   */
  async expire(
    chargePointId: string,
    handle: ConnectionHandle,
    now: number,
    deadlineMs: number
  ): Promise<boolean> {
    return this.lock.runExclusive(chargePointId, async () => {
      const current = this.registry.lookup(chargePointId)
      if (current.status !== 'connected' || current.handle !== handle) {
        return false
      }
      if (now - current.lastActivityAt <= deadlineMs) {
        return false
      }
      this.registry.unregister(chargePointId, handle)
      this.metrics.setGauge('ocpp_connections_active', this.registry.size())
      try {
        handle.close(1001, 'Heartbeat deadline missed')
      } catch (error) {
        this.logger.warn(`Failed to close ${handle.connectionId}: ${describe(error)}`)
      }
      this.logger.warn(
        `${chargePointId} missed its heartbeat deadline (idle ${now - current.lastActivityAt}ms)`
      )
      await this.markOffline(chargePointId, new Date(now), 'heartbeat-timeout')
      return true
    })
  }

  dispatch(message: InboundMessage, now = new Date()): Promise<InboundResult> {
    switch (message.kind) {
      case 'BootNotification':
        return this.onBoot(message, now)
      case 'Heartbeat':
        return this.onHeartbeat(message.chargePointId, now)
      case 'Authorize':
        return this.onAuthorize(message.chargePointId, message.idTag, now)
      case 'StatusNotification':
        return this.onStatusNotification(message, now)
      case 'StartTransaction':
        return this.onStartTransaction(message, now)
      case 'StopTransaction':
        return this.onStopTransaction(message, now)
      case 'MeterValues':
        return this.onMeterValues(message, now)
      case 'DataTransfer':
        return this.onDataTransfer(message, now)
      default:
        return assertNever(message)
    }
  }

  onBoot(message: MessageOf<'BootNotification'>, now = new Date()): Promise<ResultOf<'BootNotification'>> {
    const { kind: _kind, ...boot } = message
    return this.exclusive(boot.chargePointId, now, async () => {
      await this.store.upsertChargePoint(boot, now)
      this.online.add(boot.chargePointId)
      await this.ledger.hydrate(boot.chargePointId)
      this.logger.log(`${boot.chargePointId} booted (${boot.vendor} ${boot.model})`)
      await this.events.publishStationEvent(
        'StationBooted',
        { chargePointId: boot.chargePointId },
        {
          vendor: boot.vendor,
          model: boot.model,
          firmwareVersion: boot.firmwareVersion,
        }
      )
      return {
        kind: 'BootNotification',
        status: 'Accepted',
        currentTime: now,
        interval: this.heartbeatIntervalSeconds,
      }
    })
  }

  onHeartbeat(chargePointId: string, now = new Date()): Promise<ResultOf<'Heartbeat'>> {
    return this.exclusive(chargePointId, now, async () => {
      await this.persistQuietly('touchChargePoint', () =>
        this.store.touchChargePoint(chargePointId, now)
      )
      return { kind: 'Heartbeat', currentTime: now }
    })
  }

  onAuthorize(chargePointId: string, idTag: string, now = new Date()): Promise<ResultOf<'Authorize'>> {
    return this.exclusive(chargePointId, now, async () => {
      const authorization = await this.authorizations.resolve(idTag, now.getTime())
      this.metrics.increment('ocpp_authorizations_total', { verdict: authorization.verdict })
      return { kind: 'Authorize', authorization }
    })
  }

  /** Status reports are never rejected; a failed write is logged. */
  onStatusNotification(
    message: MessageOf<'StatusNotification'>,
    now = new Date()
  ): Promise<ResultOf<'StatusNotification'>> {
    const { chargePointId, connectorId, status } = message
    return this.exclusive(chargePointId, now, async () => {
      await this.persistQuietly('upsertConnector', () =>
        this.store.upsertConnector({
          chargePointId,
          connectorId,
          status,
          errorCode: message.errorCode,
          info: message.info,
          vendorId: message.vendorId,
          vendorErrorCode: message.vendorErrorCode,
          statusAt: message.timestamp ?? now,
          availability: status === 'Unavailable' ? 'Inoperative' : 'Operative',
        })
      )
      await this.events.publishStationEvent(
        'ConnectorStatusChanged',
        { chargePointId, connectorId },
        { status, errorCode: message.errorCode, info: message.info }
      )
      return { kind: 'StatusNotification' }
    })
  }

  onStartTransaction(
    message: MessageOf<'StartTransaction'>,
    now = new Date()
  ): Promise<ResultOf<'StartTransaction'>> {
    const { chargePointId, connectorId, idTag } = message
    return this.exclusive(chargePointId, now, async () => {
      let authorization: Authorization
      try {
        authorization = await this.authorizations.resolve(idTag, now.getTime())
      } catch (error) {
        if (!(error instanceof StorageFailure)) {
          throw error
        }
        this.logger.error(`Start on ${chargePointId}/${connectorId} refused: ${error.message}`)
        return this.rejectStart('StorageFailure', { verdict: 'Invalid' })
      }

      const result = await this.ledger.begin({
        chargePointId,
        connectorId,
        idTag,
        verdict: authorization.verdict,
        meterStart: message.meterStart,
        startedAt: message.timestamp,
        reservationId: message.reservationId,
      })

      switch (result.status) {
        case 'started': {
          const { transactionId } = result.session
          this.metrics.increment('ocpp_transactions_total', { outcome: 'started' })
          this.logger.log(`Transaction ${transactionId} started on ${chargePointId}/${connectorId}`)
          await this.events.publishSessionEvent(
            'SessionStarted',
            { chargePointId, connectorId, transactionId },
            { idTag, meterStart: message.meterStart, startedAt: message.timestamp.toISOString() }
          )
          return { kind: 'StartTransaction', outcome: 'accepted', transactionId, authorization }
        }
        case 'not-authorized':
          this.logger.warn(`Start on ${chargePointId}/${connectorId} refused: tag ${result.verdict}`)
          return this.rejectStart('NotAuthorized', authorization)
        case 'connector-busy':
          this.logger.warn(
            `Start on ${chargePointId}/${connectorId} refused: connector busy with transaction ${
              result.activeTransactionId ?? 'pending'
            }`
          )
          return this.rejectStart('ConnectorBusy', authorization)
        case 'storage-failure':
          return this.rejectStart('StorageFailure', authorization)
      }
    })
  }

  /**
   * Always answered with Accepted at protocol level. A stop that matches no
   * Active session is logged; a failed write is raised so the device retries.
   */
  onStopTransaction(
    message: MessageOf<'StopTransaction'>,
    now = new Date()
  ): Promise<ResultOf<'StopTransaction'>> {
    const { chargePointId, transactionId } = message
    return this.exclusive(chargePointId, now, async () => {
      if (message.samples.length > 0) {
        const active = await this.ledger.findActive(chargePointId, transactionId)
        await this.ledger.recordSamples(
          chargePointId,
          active ? active.connectorId : 0,
          message.samples,
          transactionId
        )
      }

      const authorization = message.idTag
        ? await this.resolveQuietly(message.idTag, now)
        : undefined

      const result = await this.ledger.complete({
        chargePointId,
        transactionId,
        meterStop: message.meterStop,
        stoppedAt: message.timestamp,
        reason: message.reason,
        stopIdTag: message.idTag,
      })

      switch (result.status) {
        case 'completed': {
          const { session } = result
          this.metrics.increment('ocpp_transactions_total', { outcome: 'completed' })
          this.logger.log(
            `Transaction ${transactionId} stopped on ${chargePointId}/${session.connectorId} (${
              session.meterStop - session.meterStart
            } Wh)`
          )
          await this.events.publishSessionEvent(
            'SessionStopped',
            { chargePointId, connectorId: session.connectorId, transactionId },
            {
              meterStart: session.meterStart,
              meterStop: session.meterStop,
              stoppedAt: session.stoppedAt.toISOString(),
              reason: session.reason,
            }
          )
          return { kind: 'StopTransaction', outcome: 'completed', session, authorization }
        }
        case 'not-found':
          this.metrics.increment('ocpp_transactions_total', { outcome: 'stop_not_found' })
          this.logger.warn(`NotFound: no active transaction ${transactionId} on ${chargePointId}`)
          await this.events.publishSessionEvent(
            'SessionStopUnmatched',
            { chargePointId, transactionId },
            { meterStop: message.meterStop, reason: message.reason }
          )
          return { kind: 'StopTransaction', outcome: 'not-found', authorization }
        case 'storage-failure':
          throw result.error
      }
    })
  }

  onMeterValues(message: MessageOf<'MeterValues'>, now = new Date()): Promise<ResultOf<'MeterValues'>> {
    const { chargePointId, connectorId } = message
    return this.exclusive(chargePointId, now, async () => {
      const attribution = await this.ledger.recordSamples(
        chargePointId,
        connectorId,
        message.samples,
        message.transactionId
      )
      if (attribution.orphaned) {
        this.metrics.increment('ocpp_orphaned_samples_total', {}, attribution.stored)
        this.logger.warn(
          `Stored ${attribution.stored} orphaned samples for idle connector ${chargePointId}/${connectorId}`
        )
      }
      await this.events.publishSessionEvent(
        'MeterValuesReceived',
        { chargePointId, connectorId, transactionId: attribution.transactionId ?? undefined },
        { samples: attribution.stored, orphaned: attribution.orphaned }
      )
      return { kind: 'MeterValues', attribution }
    })
  }

  /** Vendor payloads are logged and stored, never interpreted. */
  onDataTransfer(message: MessageOf<'DataTransfer'>, now = new Date()): Promise<ResultOf<'DataTransfer'>> {
    const { chargePointId, vendorId, messageId } = message
    return this.exclusive(chargePointId, now, async () => {
      this.logger.log(`DataTransfer from ${chargePointId}: vendor ${vendorId} message ${messageId ?? '-'}`)
      await this.persistQuietly('recordDataTransfer', () =>
        this.store.recordDataTransfer({
          chargePointId,
          vendorId,
          messageId,
          data: message.data,
          receivedAt: now,
        })
      )
      await this.events.publishStationEvent(
        'DataTransferReceived',
        { chargePointId },
        { vendorId, messageId }
      )
      return { kind: 'DataTransfer', status: 'Accepted' }
    })
  }

  async sendRemoteStart(
    chargePointId: string,
    idTag: string,
    connectorId?: number,
    options: CommandOptions = {}
  ): Promise<CommandResult<'RemoteStartTransaction'>> {
    const target = this.registry.lookup(chargePointId)
    if (target.status !== 'connected') {
      return { status: 'unreachable' }
    }
    const authorization = await this.authorizations.resolve(idTag)
    if (authorization.verdict !== 'Accepted') {
      return { status: 'invalid', reason: `Tag ${idTag} is ${authorization.verdict}` }
    }
    if (connectorId !== undefined && (await this.ledger.activeFor(chargePointId, connectorId))) {
      return { status: 'invalid', reason: `Connector ${connectorId} has an active transaction` }
    }
    const payload = connectorId === undefined ? { idTag } : { idTag, connectorId }
    return this.dispatcher.dispatch(target.handle, 'RemoteStartTransaction', payload, options.timeoutMs)
  }

  /**
   * The session stays Active whatever the outcome; only the device's own
   * StopTransaction report completes it.
   */
  async sendRemoteStop(
    chargePointId: string,
    transactionId: number,
    options: CommandOptions = {}
  ): Promise<CommandResult<'RemoteStopTransaction'>> {
    const target = this.registry.lookup(chargePointId)
    if (target.status !== 'connected') {
      return { status: 'unreachable' }
    }
    const session = await this.ledger.findActive(chargePointId, transactionId)
    if (!session) {
      return { status: 'invalid', reason: `Transaction ${transactionId} is not active on ${chargePointId}` }
    }
    const result = await this.dispatcher.dispatch(
      target.handle,
      'RemoteStopTransaction',
      { transactionId },
      options.timeoutMs
    )
    if (result.status === 'timeout') {
      this.logger.warn(
        `RemoteStopTransaction ${transactionId} to ${chargePointId} timed out; session left Active`
      )
    }
    return result
  }

  async changeAvailability(
    chargePointId: string,
    connectorId: number,
    type: AvailabilityType,
    options: CommandOptions = {}
  ): Promise<CommandResult<'ChangeAvailability'>> {
    const target = this.registry.lookup(chargePointId)
    if (target.status !== 'connected') {
      return { status: 'unreachable' }
    }
    const result = await this.dispatcher.dispatch(
      target.handle,
      'ChangeAvailability',
      { connectorId, type },
      options.timeoutMs
    )
    if (result.status === 'replied' && result.reply.status !== 'Rejected') {
      await this.persistQuietly('setConnectorAvailability', () =>
        this.store.setConnectorAvailability(chargePointId, connectorId, type)
      )
    }
    return result
  }

  async reset(
    chargePointId: string,
    type: ResetType,
    options: CommandOptions = {}
  ): Promise<CommandResult<'Reset'>> {
    const target = this.registry.lookup(chargePointId)
    if (target.status !== 'connected') {
      return { status: 'unreachable' }
    }
    return this.dispatcher.dispatch(target.handle, 'Reset', { type }, options.timeoutMs)
  }

  async changeConfiguration(
    chargePointId: string,
    key: string,
    value: string,
    options: CommandOptions = {}
  ): Promise<CommandResult<'ChangeConfiguration'>> {
    const target = this.registry.lookup(chargePointId)
    if (target.status !== 'connected') {
      return { status: 'unreachable' }
    }
    const result = await this.dispatcher.dispatch(
      target.handle,
      'ChangeConfiguration',
      { key, value },
      options.timeoutMs
    )
    if (
      result.status === 'replied' &&
      (result.reply.status === 'Accepted' || result.reply.status === 'RebootRequired')
    ) {
      await this.persistQuietly('saveConfiguration', () =>
        this.store.saveConfiguration(chargePointId, [{ key, value, readonly: false }])
      )
    }
    return result
  }

  async getConfiguration(
    chargePointId: string,
    keys?: string[],
    options: CommandOptions = {}
  ): Promise<CommandResult<'GetConfiguration'>> {
    const target = this.registry.lookup(chargePointId)
    if (target.status !== 'connected') {
      return { status: 'unreachable' }
    }
    const payload = keys && keys.length > 0 ? { key: keys } : {}
    const result = await this.dispatcher.dispatch(
      target.handle,
      'GetConfiguration',
      payload,
      options.timeoutMs
    )
    if (result.status === 'replied') {
      const entries = toConfigurationEntries(result.reply)
      await this.persistQuietly('saveConfiguration', () =>
        this.store.saveConfiguration(chargePointId, entries)
      )
    }
    return result
  }

  /** Clears the local authorization cache, then asks the charge point to clear its own. */
  async clearCache(
    chargePointId: string,
    options: CommandOptions = {}
  ): Promise<CommandResult<'ClearCache'>> {
    this.authorizations.invalidateAll()
    const target = this.registry.lookup(chargePointId)
    if (target.status !== 'connected') {
      return { status: 'unreachable' }
    }
    return this.dispatcher.dispatch(target.handle, 'ClearCache', {}, options.timeoutMs)
  }

  async getChargePointStatus(chargePointId: string): Promise<ChargePointStatus | null> {
    const live = this.registry.lookup(chargePointId)
    const record = await this.store.getChargePoint(chargePointId)
    if (!record && live.status !== 'connected') {
      return null
    }
    const [connectors, activeSessions] = await Promise.all([
      this.store.listConnectors(chargePointId),
      this.ledger.activeSessions(chargePointId),
    ])
    const connected = live.status === 'connected'
    return {
      chargePointId,
      reachability: this.reachabilityOf(chargePointId, record),
      connected,
      connectedAt: connected ? new Date(live.connectedAt) : null,
      lastActivityAt: connected ? new Date(live.lastActivityAt) : record?.lastSeenAt ?? null,
      record,
      connectors,
      activeSessions,
    }
  }

  async listChargePoints(): Promise<ChargePointSummary[]> {
    const records = await this.store.listChargePoints()
    const summaries: ChargePointSummary[] = records.map((record) => ({
      chargePointId: record.chargePointId,
      vendor: record.vendor,
      model: record.model,
      reachability: this.reachabilityOf(record.chargePointId, record),
      connected: this.registry.lookup(record.chargePointId).status === 'connected',
      lastSeenAt: record.lastSeenAt,
    }))
    const known = new Set(records.map((record) => record.chargePointId))
    for (const chargePointId of this.registry.connectedIds()) {
      if (!known.has(chargePointId)) {
        summaries.push({
          chargePointId,
          vendor: null,
          model: null,
          reachability: this.reachabilityOf(chargePointId, null),
          connected: true,
          lastSeenAt: null,
        })
      }
    }
    return summaries.sort((a, b) => a.chargePointId.localeCompare(b.chargePointId))
  }

  private exclusive<T>(chargePointId: string, now: Date, fn: () => Promise<T>): Promise<T> {
    return this.lock.runExclusive(chargePointId, async () => {
      this.registry.touch(chargePointId, now.getTime())
      await this.markOnline(chargePointId, now)
      return fn()
    })
  }

  private async markOnline(chargePointId: string, now: Date): Promise<void> {
    if (this.online.has(chargePointId)) {
      return
    }
    if (this.registry.lookup(chargePointId).status !== 'connected') {
      return
    }
    const persisted = await this.persistQuietly('setReachability', () =>
      this.store.setReachability(chargePointId, 'Online', now)
    )
    if (!persisted) {
      return
    }
    this.online.add(chargePointId)
    this.logger.log(`${chargePointId} is Online`)
    await this.events.publishStationEvent('StationOnline', { chargePointId })
  }

  private async markOffline(chargePointId: string, now: Date, cause: string): Promise<void> {
    this.online.delete(chargePointId)
    await this.persistQuietly('setReachability', () =>
      this.store.setReachability(chargePointId, 'Offline', now)
    )
    this.logger.log(`${chargePointId} is Offline (${cause})`)
    await this.events.publishStationEvent('StationOffline', { chargePointId }, { cause })
  }

  private reachabilityOf(chargePointId: string, record: ChargePointRecord | null): Reachability {
    if (this.online.has(chargePointId) && this.registry.lookup(chargePointId).status === 'connected') {
      return 'Online'
    }
    return record?.reachability ?? 'Unknown'
  }

  private rejectStart(
    reason: 'NotAuthorized' | 'ConnectorBusy' | 'StorageFailure',
    authorization: Authorization
  ): ResultOf<'StartTransaction'> {
    this.metrics.increment('ocpp_transactions_total', { outcome: 'rejected', reason })
    return { kind: 'StartTransaction', outcome: 'rejected', reason, authorization }
  }

  private async resolveQuietly(idTag: string, now: Date): Promise<Authorization | undefined> {
    try {
      return await this.authorizations.resolve(idTag, now.getTime())
    } catch (error) {
      if (!(error instanceof StorageFailure)) {
        throw error
      }
      this.logger.warn(`Could not resolve stop tag ${idTag}: ${error.message}`)
      return undefined
    }
  }

  /** Runs a write whose failure must not fail the caller. */
  private async persistQuietly(operation: string, fn: () => Promise<void>): Promise<boolean> {
    try {
      await fn()
      return true
    } catch (error) {
      if (!(error instanceof StorageFailure)) {
        throw error
      }
      this.metrics.increment('storage_failures_total', { operation })
      this.logger.error(`${operation} failed: ${error.message}`)
      return false
    }
  }
}

function toConfigurationEntries(reply: OutboundReplies['GetConfiguration']): ConfigurationEntry[] {
  return (reply.configurationKey ?? []).map((entry) => ({
    key: entry.key,
    value: entry.value ?? null,
    readonly: entry.readonly,
  }))
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}

function assertNever(value: never): never {
  throw new Error(`Unhandled message ${JSON.stringify(value)}`)
}
