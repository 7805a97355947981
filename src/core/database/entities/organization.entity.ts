import {
  Column,
  CreateDateColumn,
  Entity,
  OneToMany,
  OneToOne,
  PrimaryGeneratedColumn,
} from 'typeorm';
import type { SubscriptionEntity } from './subscription.entity';
import type { UserEntity } from './user.entity';

@Entity('organizations')
export class OrganizationEntity {
  @PrimaryGeneratedColumn()
  id!: number;

  @Column('varchar', { length: 200 })
  name!: string;

  @Column('varchar', { length: 80, unique: true })
  slug!: string;

  @CreateDateColumn({ name: 'created_at' })
  createdAt!: Date;

  @OneToMany('UserEntity', (user: UserEntity) => user.organization)
  users?: UserEntity[];

  @OneToOne(
    'SubscriptionEntity',
    (subscription: SubscriptionEntity) => subscription.organization,
  )
  subscription?: SubscriptionEntity;
}
