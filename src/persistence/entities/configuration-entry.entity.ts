import { Column, Entity, PrimaryGeneratedColumn, Unique, UpdateDateColumn } from 'typeorm'

@Entity('configuration')
@Unique('uq_configuration_charge_point_key', ['chargePointId', 'key'])
export class ConfigurationEntryEntity {
  @PrimaryGeneratedColumn()
  id!: number

  @Column({ name: 'charge_point_id', type: 'varchar', length: 64 })
  chargePointId!: string

  @Column({ type: 'varchar', length: 50 })
  key!: string

  @Column({ type: 'varchar', length: 500, nullable: true })
  value!: string | null

  @Column({ type: 'boolean', default: false })
  readonly!: boolean

  @UpdateDateColumn({ name: 'updated_at', type: 'timestamptz' })
  updatedAt!: Date
}
