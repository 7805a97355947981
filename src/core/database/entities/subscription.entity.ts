import {
  Column,
  CreateDateColumn,
  Entity,
  JoinColumn,
  OneToOne,
  PrimaryGeneratedColumn,
} from 'typeorm';
import {
  DEFAULT_PLAN,
  DEFAULT_STATUS,
  Plan,
  SubscriptionState,
  SubscriptionStatus,
} from '../../../domain/billing/models';
import { OrganizationEntity } from './organization.entity';

@Entity('subscriptions')
export class SubscriptionEntity implements SubscriptionState {
  @PrimaryGeneratedColumn()
  id!: number;

  @Column('integer', { name: 'organization_id', unique: true })
  organizationId!: number;

  @Column('varchar', { length: 32, default: DEFAULT_PLAN })
  plan!: Plan;

  @Column('varchar', { length: 32, default: DEFAULT_STATUS })
  status!: SubscriptionStatus;

  @Column('varchar', { name: 'stripe_customer_id', length: 255, nullable: true })
  stripeCustomerId!: string | null;

  @Column('varchar', {
    name: 'stripe_subscription_id',
    length: 255,
    nullable: true,
  })
  stripeSubscriptionId!: string | null;

  @Column({ name: 'current_period_end', type: Date, nullable: true })
  currentPeriodEnd!: Date | null;

  @CreateDateColumn({ name: 'created_at' })
  createdAt!: Date;

  // Written explicitly on each mutation rather than by the ORM.
  @Column({ name: 'updated_at', type: Date })
  updatedAt!: Date;

  @OneToOne(() => OrganizationEntity, (organization) => organization.subscription, {
    onDelete: 'CASCADE',
  })
  @JoinColumn({ name: 'organization_id' })
  organization?: OrganizationEntity;
}
