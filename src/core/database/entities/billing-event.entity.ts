import {
  Column,
  CreateDateColumn,
  Entity,
  Index,
  JoinColumn,
  ManyToOne,
  PrimaryGeneratedColumn,
} from 'typeorm';
import { JsonObject } from '../../../domain/billing/models';
import { OrganizationEntity } from './organization.entity';

/**
 * Append-only webhook ledger. The unique constraint on idempotency_key is the
 * deduplication guarantee for redelivered events.
 */
@Entity('billing_events')
export class BillingEventEntity {
  @PrimaryGeneratedColumn()
  id!: number;

  @Index()
  @Column('integer', { name: 'organization_id', nullable: true })
  organizationId!: number | null;

  @Index()
  @Column('varchar', { name: 'event_type', length: 120 })
  eventType!: string;

  @Column('varchar', { name: 'idempotency_key', length: 200, unique: true })
  idempotencyKey!: string;

  @Column('simple-json')
  payload!: JsonObject;

  @CreateDateColumn({ name: 'received_at' })
  receivedAt!: Date;

  @ManyToOne(() => OrganizationEntity, { onDelete: 'SET NULL', nullable: true })
  @JoinColumn({ name: 'organization_id' })
  organization?: OrganizationEntity | null;
}
