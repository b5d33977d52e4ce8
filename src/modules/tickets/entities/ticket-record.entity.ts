import { Column, CreateDateColumn, Entity, PrimaryColumn } from 'typeorm';
import { IsoDateTransformer } from '../../../common/transformers/iso-date.transformer';
import { DeviceInfo, RequesterAddress, TicketStatus } from '../tickets.types';

@Entity('tickets')
export class TicketRecord {
  @PrimaryColumn({ name: 'ticket_id', type: 'uuid' })
  ticketId!: string;

  @Column({ name: 'full_name' })
  fullName!: string;

  @Column({ name: 'national_id', length: 14 })
  nationalId!: string;

  @Column()
  email!: string;

  @Column()
  phone!: string;

  @Column({ type: 'jsonb' })
  address!: RequesterAddress;

  @Column({ type: 'jsonb' })
  device!: DeviceInfo;

  @Column({ type: 'text', default: '' })
  notes!: string;

  @Column({ type: 'varchar', length: 16 })
  status!: TicketStatus;

  @Column({ name: 'rejection_reason', type: 'varchar', nullable: true })
  rejectionReason!: string | null;

  @Column({ name: 'opened_at', type: 'timestamptz', transformer: IsoDateTransformer })
  openedAt!: string;

  @Column({ name: 'processed_at', type: 'timestamptz', transformer: IsoDateTransformer })
  processedAt!: string;

  @Column({ name: 'notified_at', type: 'timestamptz', nullable: true, transformer: IsoDateTransformer })
  notifiedAt!: string | null;

  @CreateDateColumn({ name: 'created_at', type: 'timestamptz' })
  createdAt!: Date;
}
