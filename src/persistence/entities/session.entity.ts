import { Column, Entity, Index, OneToMany, PrimaryGeneratedColumn } from 'typeorm'
import type { SessionStatus } from '../../session/session.types'
import { MeterValueEntity } from './meter-value.entity'

@Entity('sessions')
@Index('uq_sessions_active_connector', ['chargePointId', 'connectorId'], {
  unique: true,
  where: `"status" = 'Active'`,
})
export class SessionEntity {
  @PrimaryGeneratedColumn()
  id!: number

  @Column({ name: 'transaction_id', type: 'integer', unique: true })
  transactionId!: number

  @Column({ name: 'charge_point_id', type: 'varchar', length: 64 })
  chargePointId!: string

  @Column({ name: 'connector_id', type: 'integer' })
  connectorId!: number

  @Column({ name: 'id_tag', type: 'varchar', length: 20 })
  idTag!: string

  @Column({ name: 'meter_start', type: 'integer' })
  meterStart!: number

  @Column({ name: 'meter_stop', type: 'integer', nullable: true })
  meterStop!: number | null

  @Column({ name: 'started_at', type: 'timestamptz' })
  startedAt!: Date

  @Column({ name: 'stopped_at', type: 'timestamptz', nullable: true })
  stoppedAt!: Date | null

  @Column({ type: 'varchar', length: 16, default: 'Active' })
  status!: SessionStatus

  @Column({ name: 'stop_reason', type: 'varchar', length: 32, nullable: true })
  stopReason!: string | null

  @Column({ name: 'stop_id_tag', type: 'varchar', length: 20, nullable: true })
  stopIdTag!: string | null

  @Column({ name: 'reservation_id', type: 'integer', nullable: true })
  reservationId!: number | null

  @OneToMany(() => MeterValueEntity, (sample) => sample.session)
  meterValues?: MeterValueEntity[]
}
