import { Column, Entity, PrimaryGeneratedColumn, Unique } from 'typeorm'
import type { Availability, ConnectorStatus } from '../../session/session.types'

@Entity('connectors')
@Unique('uq_connectors_charge_point_connector', ['chargePointId', 'connectorId'])
export class ConnectorEntity {
  @PrimaryGeneratedColumn()
  id!: number

  @Column({ name: 'charge_point_id', type: 'varchar', length: 64 })
  chargePointId!: string

  @Column({ name: 'connector_id', type: 'integer' })
  connectorId!: number

  @Column({ type: 'varchar', length: 32, nullable: true })
  status!: ConnectorStatus | null

  @Column({ name: 'error_code', type: 'varchar', length: 50, nullable: true })
  errorCode!: string | null

  @Column({ type: 'varchar', length: 50, nullable: true })
  info!: string | null

  @Column({ name: 'vendor_id', type: 'varchar', length: 255, nullable: true })
  vendorId!: string | null

  @Column({ name: 'vendor_error_code', type: 'varchar', length: 50, nullable: true })
  vendorErrorCode!: string | null

  @Column({ type: 'varchar', length: 16, default: 'Operative' })
  availability!: Availability

  @Column({ name: 'status_at', type: 'timestamptz', nullable: true })
  statusAt!: Date | null
}
