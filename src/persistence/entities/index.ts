import { ChargePointEntity } from './charge-point.entity'
import { ConfigurationEntryEntity } from './configuration-entry.entity'
import { ConnectorEntity } from './connector.entity'
import { DataTransferEntity } from './data-transfer.entity'
import { IdTagEntity } from './id-tag.entity'
import { MeterValueEntity } from './meter-value.entity'
import { SessionEntity } from './session.entity'

export {
  ChargePointEntity,
  ConfigurationEntryEntity,
  ConnectorEntity,
  DataTransferEntity,
  IdTagEntity,
  MeterValueEntity,
  SessionEntity,
}

export const ENTITIES = [
  ChargePointEntity,
  ConnectorEntity,
  IdTagEntity,
  SessionEntity,
  MeterValueEntity,
  ConfigurationEntryEntity,
  DataTransferEntity,
]
