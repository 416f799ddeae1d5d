import { Injectable, Logger } from '@nestjs/common'
import { ConfigService } from '@nestjs/config'
import { InjectRepository } from '@nestjs/typeorm'
import { Repository } from 'typeorm'
import { withRetry } from '../resilience/retry'
import type { Availability, Reachability } from '../session/session.types'
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
} from './charging-store'
import {
  ChargePointEntity,
  ConfigurationEntryEntity,
  ConnectorEntity,
  DataTransferEntity,
  IdTagEntity,
  MeterValueEntity,
  SessionEntity,
} from './entities'

@Injectable()
export class TypeOrmChargingStore extends ChargingStore {
  private readonly logger = new Logger(TypeOrmChargingStore.name)
  private readonly readBackoffMs: number

  constructor(
    @InjectRepository(ChargePointEntity)
    private readonly chargePoints: Repository<ChargePointEntity>,
    @InjectRepository(ConnectorEntity)
    private readonly connectors: Repository<ConnectorEntity>,
    @InjectRepository(IdTagEntity)
    private readonly idTags: Repository<IdTagEntity>,
    @InjectRepository(SessionEntity)
    private readonly sessions: Repository<SessionEntity>,
    @InjectRepository(MeterValueEntity)
    private readonly meterValues: Repository<MeterValueEntity>,
    @InjectRepository(ConfigurationEntryEntity)
    private readonly configuration: Repository<ConfigurationEntryEntity>,
    @InjectRepository(DataTransferEntity)
    private readonly dataTransfers: Repository<DataTransferEntity>,
    config: ConfigService
  ) {
    super()
    this.readBackoffMs = config.get<number>('database.readRetryBackoffMs') ?? 100
  }

  async upsertChargePoint(boot: BootInfo, seenAt: Date): Promise<ChargePointRecord> {
    await this.write('upsertChargePoint', () =>
      this.chargePoints.upsert(
        {
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
        },
        ['chargePointId']
      )
    )
    const stored = await this.getChargePoint(boot.chargePointId)
    if (!stored) {
      throw new StorageFailure('upsertChargePoint', new Error('row missing after upsert'))
    }
    return stored
  }

  async getChargePoint(chargePointId: string): Promise<ChargePointRecord | null> {
    const row = await this.read('getChargePoint', () =>
      this.chargePoints.findOneBy({ chargePointId })
    )
    return row ? toChargePointRecord(row) : null
  }

  async listChargePoints(): Promise<ChargePointRecord[]> {
    const rows = await this.read('listChargePoints', () =>
      this.chargePoints.find({ order: { chargePointId: 'ASC' } })
    )
    return rows.map(toChargePointRecord)
  }

  async setReachability(
    chargePointId: string,
    reachability: Reachability,
    seenAt: Date
  ): Promise<void> {
    await this.write('setReachability', () =>
      this.chargePoints.update({ chargePointId }, { reachability, lastSeenAt: seenAt })
    )
  }

  async touchChargePoint(chargePointId: string, seenAt: Date): Promise<void> {
    await this.write('touchChargePoint', () =>
      this.chargePoints.update({ chargePointId }, { lastSeenAt: seenAt })
    )
  }

  async upsertConnector(update: ConnectorStatusUpdate): Promise<void> {
    await this.write('upsertConnector', () =>
      this.connectors.upsert(
        {
          chargePointId: update.chargePointId,
          connectorId: update.connectorId,
          status: update.status,
          errorCode: update.errorCode,
          info: update.info ?? null,
          vendorId: update.vendorId ?? null,
          vendorErrorCode: update.vendorErrorCode ?? null,
          availability: update.availability,
          statusAt: update.statusAt,
        },
        ['chargePointId', 'connectorId']
      )
    )
  }

  async listConnectors(chargePointId: string): Promise<ConnectorRecord[]> {
    const rows = await this.read('listConnectors', () =>
      this.connectors.find({ where: { chargePointId }, order: { connectorId: 'ASC' } })
    )
    return rows.map((row) => ({
      chargePointId: row.chargePointId,
      connectorId: row.connectorId,
      status: row.status,
      errorCode: row.errorCode,
      info: row.info,
      vendorErrorCode: row.vendorErrorCode,
      availability: row.availability,
      statusAt: row.statusAt,
    }))
  }

  async setConnectorAvailability(
    chargePointId: string,
    connectorId: number,
    availability: Availability
  ): Promise<void> {
    if (connectorId === 0) {
      await this.write('setConnectorAvailability', () =>
        this.connectors.update({ chargePointId }, { availability })
      )
      return
    }
    await this.write('setConnectorAvailability', () =>
      this.connectors.upsert({ chargePointId, connectorId, availability }, [
        'chargePointId',
        'connectorId',
      ])
    )
  }

  async findIdTag(tag: string): Promise<IdTagRecord | null> {
    const row = await this.read('findIdTag', () => this.idTags.findOneBy({ tag }))
    if (!row) {
      return null
    }
    return {
      tag: row.tag,
      status: row.status,
      expiryDate: row.expiryDate,
      parentTag: row.parentTag,
    }
  }

  async insertSession(session: NewSession): Promise<SessionRecord> {
    const row = await this.write('insertSession', () =>
      this.sessions.save(
        this.sessions.create({
          transactionId: session.transactionId,
          chargePointId: session.chargePointId,
          connectorId: session.connectorId,
          idTag: session.idTag,
          meterStart: session.meterStart,
          startedAt: session.startedAt,
          status: 'Active',
          meterStop: null,
          stoppedAt: null,
          stopReason: null,
          stopIdTag: null,
          reservationId: session.reservationId ?? null,
        })
      )
    )
    return toSessionRecord(row)
  }

  async completeSession(transactionId: number, stop: SessionStop): Promise<void> {
    const result = await this.write('completeSession', () =>
      this.sessions.update(
        { transactionId, status: 'Active' },
        {
          status: 'Completed',
          meterStop: stop.meterStop,
          stoppedAt: stop.stoppedAt,
          stopReason: stop.stopReason ?? null,
          stopIdTag: stop.stopIdTag ?? null,
        }
      )
    )
    if (result.affected === 0) {
      throw new StorageFailure(
        'completeSession',
        new Error(`no active session row for transaction ${transactionId}`)
      )
    }
  }

  async findSession(transactionId: number): Promise<SessionRecord | null> {
    const row = await this.read('findSession', () => this.sessions.findOneBy({ transactionId }))
    return row ? toSessionRecord(row) : null
  }

  async findActiveSession(chargePointId: string, connectorId: number): Promise<SessionRecord | null> {
    const row = await this.read('findActiveSession', () =>
      this.sessions.findOneBy({ chargePointId, connectorId, status: 'Active' })
    )
    return row ? toSessionRecord(row) : null
  }

  async findActiveSessions(chargePointId: string): Promise<SessionRecord[]> {
    const rows = await this.read('findActiveSessions', () =>
      this.sessions.find({
        where: { chargePointId, status: 'Active' },
        order: { startedAt: 'ASC' },
      })
    )
    return rows.map(toSessionRecord)
  }

  async maxTransactionId(): Promise<number> {
    const raw = await this.read('maxTransactionId', () =>
      this.sessions
        .createQueryBuilder('session')
        .select('MAX(session.transactionId)', 'max')
        .getRawOne<{ max: number | string | null }>()
    )
    const value = raw?.max === null || raw?.max === undefined ? 0 : Number(raw.max)
    return Number.isFinite(value) ? value : 0
  }

  async appendMeterSamples(samples: NewMeterSample[]): Promise<void> {
    if (samples.length === 0) {
      return
    }
    await this.write('appendMeterSamples', () =>
      this.meterValues.insert(
        samples.map((sample) => ({
          sessionId: sample.sessionId,
          chargePointId: sample.chargePointId,
          connectorId: sample.connectorId,
          transactionId: sample.transactionId,
          orphaned: sample.orphaned,
          sampledAt: sample.sampledAt,
          value: sample.value,
          measurand: sample.measurand,
          unit: sample.unit,
          phase: sample.phase ?? null,
          context: sample.context ?? null,
          location: sample.location ?? null,
        }))
      )
    )
  }

  async saveConfiguration(chargePointId: string, entries: ConfigurationEntry[]): Promise<void> {
    if (entries.length === 0) {
      return
    }
    await this.write('saveConfiguration', () =>
      this.configuration.upsert(
        entries.map((entry) => ({
          chargePointId,
          key: entry.key,
          value: entry.value,
          readonly: entry.readonly,
        })),
        ['chargePointId', 'key']
      )
    )
  }

  async recordDataTransfer(transfer: DataTransferInput): Promise<void> {
    await this.write('recordDataTransfer', () =>
      this.dataTransfers.insert({
        chargePointId: transfer.chargePointId,
        vendorId: transfer.vendorId,
        messageId: transfer.messageId ?? null,
        data: transfer.data ?? null,
        receivedAt: transfer.receivedAt,
      })
    )
  }

  private async read<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await withRetry(fn, {
        retries: 1,
        backoffMs: this.readBackoffMs,
        onRetry: (error) =>
          this.logger.warn(`Retrying ${operation} after failure: ${describeError(error)}`),
      })
    } catch (error) {
      throw new StorageFailure(operation, error)
    }
  }

  private async write<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn()
    } catch (error) {
      throw error instanceof StorageFailure ? error : new StorageFailure(operation, error)
    }
  }
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}

function toChargePointRecord(row: ChargePointEntity): ChargePointRecord {
  return {
    chargePointId: row.chargePointId,
    vendor: row.vendor,
    model: row.model,
    firmwareVersion: row.firmwareVersion,
    chargePointSerialNumber: row.chargePointSerialNumber,
    chargeBoxSerialNumber: row.chargeBoxSerialNumber,
    iccid: row.iccid,
    imsi: row.imsi,
    meterType: row.meterType,
    meterSerialNumber: row.meterSerialNumber,
    reachability: row.reachability,
    lastSeenAt: row.lastSeenAt,
  }
}

function toSessionRecord(row: SessionEntity): SessionRecord {
  return {
    id: row.id,
    transactionId: row.transactionId,
    chargePointId: row.chargePointId,
    connectorId: row.connectorId,
    idTag: row.idTag,
    meterStart: row.meterStart,
    meterStop: row.meterStop,
    startedAt: row.startedAt,
    stoppedAt: row.stoppedAt,
    status: row.status,
    stopReason: row.stopReason,
    stopIdTag: row.stopIdTag,
    reservationId: row.reservationId,
  }
}
