import { Column, CreateDateColumn, Entity, PrimaryColumn } from 'typeorm'
import type { TagStatus } from '../../session/session.types'

@Entity('id_tags')
export class IdTagEntity {
  @PrimaryColumn({ type: 'varchar', length: 20 })
  tag!: string

  @Column({ type: 'varchar', length: 16, default: 'Accepted' })
  status!: TagStatus

  @Column({ name: 'expiry_date', type: 'timestamptz', nullable: true })
  expiryDate!: Date | null

  @Column({ name: 'parent_tag', type: 'varchar', length: 20, nullable: true })
  parentTag!: string | null

  @Column({ name: 'holder_name', type: 'varchar', length: 128, nullable: true })
  holderName!: string | null

  @CreateDateColumn({ name: 'created_at', type: 'timestamptz' })
  createdAt!: Date
}
