import { Column, Entity, Index, JoinColumn, ManyToOne, PrimaryGeneratedColumn } from 'typeorm'
import { SessionEntity } from './session.entity'

@Entity('meter_values')
@Index('ix_meter_values_charge_point_sampled', ['chargePointId', 'sampledAt'])
export class MeterValueEntity {
  @PrimaryGeneratedColumn()
  id!: number

  @Column({ name: 'session_id', type: 'integer', nullable: true })
  sessionId!: number | null

  @ManyToOne(() => SessionEntity, (session) => session.meterValues, {
    nullable: true,
    onDelete: 'CASCADE',
  })
  @JoinColumn({ name: 'session_id' })
  session?: SessionEntity | null

  @Column({ name: 'charge_point_id', type: 'varchar', length: 64 })
  chargePointId!: string

  @Column({ name: 'connector_id', type: 'integer' })
  connectorId!: number

  @Column({ name: 'transaction_id', type: 'integer', nullable: true })
  transactionId!: number | null

  @Column({ type: 'boolean', default: false })
  orphaned!: boolean

  @Column({ name: 'sampled_at', type: 'timestamptz' })
  sampledAt!: Date

  @Column({ type: 'double precision' })
  value!: number

  @Column({ type: 'varchar', length: 64, default: 'Energy.Active.Import.Register' })
  measurand!: string

  @Column({ type: 'varchar', length: 16, default: 'Wh' })
  unit!: string

  @Column({ type: 'varchar', length: 16, nullable: true })
  phase!: string | null

  @Column({ type: 'varchar', length: 32, nullable: true })
  context!: string | null

  @Column({ type: 'varchar', length: 16, nullable: true })
  location!: string | null
}
