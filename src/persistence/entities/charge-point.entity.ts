import { Column, CreateDateColumn, Entity, PrimaryColumn, UpdateDateColumn } from 'typeorm'
import type { Reachability } from '../../session/session.types'

@Entity('charge_points')
export class ChargePointEntity {
  @PrimaryColumn({ name: 'charge_point_id', type: 'varchar', length: 64 })
  chargePointId!: string

  @Column({ type: 'varchar', length: 64 })
  vendor!: string

  @Column({ type: 'varchar', length: 64 })
  model!: string

  @Column({ name: 'firmware_version', type: 'varchar', length: 64, nullable: true })
  firmwareVersion!: string | null

  @Column({ name: 'charge_point_serial_number', type: 'varchar', length: 64, nullable: true })
  chargePointSerialNumber!: string | null

  @Column({ name: 'charge_box_serial_number', type: 'varchar', length: 64, nullable: true })
  chargeBoxSerialNumber!: string | null

  @Column({ type: 'varchar', length: 32, nullable: true })
  iccid!: string | null

  @Column({ type: 'varchar', length: 32, nullable: true })
  imsi!: string | null

  @Column({ name: 'meter_type', type: 'varchar', length: 64, nullable: true })
  meterType!: string | null

  @Column({ name: 'meter_serial_number', type: 'varchar', length: 64, nullable: true })
  meterSerialNumber!: string | null

  @Column({ type: 'varchar', length: 16, default: 'Unknown' })
  reachability!: Reachability

  @Column({ name: 'last_seen_at', type: 'timestamptz', nullable: true })
  lastSeenAt!: Date | null

  @CreateDateColumn({ name: 'created_at', type: 'timestamptz' })
  createdAt!: Date

  @UpdateDateColumn({ name: 'updated_at', type: 'timestamptz' })
  updatedAt!: Date
}
