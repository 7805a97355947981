import {
  Column,
  CreateDateColumn,
  Entity,
  Index,
  JoinColumn,
  ManyToOne,
  PrimaryGeneratedColumn,
  Unique,
} from 'typeorm';
import { OrganizationEntity } from './organization.entity';

@Entity('users')
@Unique('uq_org_email', ['organizationId', 'email'])
export class UserEntity {
  @PrimaryGeneratedColumn()
  id!: number;

  @Column('integer', { name: 'organization_id' })
  organizationId!: number;

  @Index()
  @Column('varchar', { length: 255 })
  email!: string;

  @Column('varchar', { name: 'full_name', length: 200 })
  fullName!: string;

  @CreateDateColumn({ name: 'created_at' })
  createdAt!: Date;

  @ManyToOne(() => OrganizationEntity, (organization) => organization.users, {
    onDelete: 'CASCADE',
  })
  @JoinColumn({ name: 'organization_id' })
  organization?: OrganizationEntity;
}
