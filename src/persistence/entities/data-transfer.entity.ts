import { Column, Entity, PrimaryGeneratedColumn } from 'typeorm'

@Entity('data_transfers')
export class DataTransferEntity {
  @PrimaryGeneratedColumn()
  id!: number

  @Column({ name: 'charge_point_id', type: 'varchar', length: 64 })
  chargePointId!: string

  @Column({ name: 'vendor_id', type: 'varchar', length: 255 })
  vendorId!: string

  @Column({ name: 'message_id', type: 'varchar', length: 50, nullable: true })
  messageId!: string | null

  @Column({ type: 'text', nullable: true })
  data!: string | null

  @Column({ name: 'received_at', type: 'timestamptz' })
  receivedAt!: Date
}
