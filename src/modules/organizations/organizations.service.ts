import {
  ConflictException,
  ForbiddenException,
  Injectable,
} from '@nestjs/common';
import { DataSource, EntityManager } from 'typeorm';
import { isUniqueViolation } from '../../core/database/database-errors';
import { UserEntity } from '../../core/database/entities';
import { TransactionRunner } from '../../core/database/transaction-runner';
import { logger } from '../../core/logger/logger.config';
import { limits } from '../../domain/billing/catalog';
import { Plan } from '../../domain/billing/models';
import { SubscriptionService } from '../billing/services/subscription.service';
import { CreateUserDto } from './dto/create-user.dto';

@Injectable()
export class OrganizationsService {
  private readonly logger = logger();

  constructor(
    private readonly dataSource: DataSource,
    private readonly transactions: TransactionRunner,
    private readonly subscriptionService: SubscriptionService,
  ) {}

  listUsers(organizationId: number): Promise<UserEntity[]> {
    return this.dataSource.manager.find(UserEntity, {
      where: { organizationId },
      order: { id: 'ASC' },
    });
  }

  /**
   * Adds a user when the organization's plan still has a free seat.
   *
   * The seat count is read before the insert, so two concurrent requests can
   * both pass the check; overage is settled by billing, not here.
   */
  async createUser(
    organizationId: number,
    payload: CreateUserDto,
  ): Promise<UserEntity> {
    const email = payload.email.trim().toLowerCase();

    try {
      return await this.transactions.run(async (manager) => {
        const subscription = await this.subscriptionService.getOrCreateSubscription(
          manager,
          organizationId,
        );
        await this.assertUserCapacity(manager, organizationId, subscription.plan);

        const existing = await manager.existsBy(UserEntity, {
          organizationId,
          email,
        });
        if (existing) {
          throw new ConflictException('User already exists in this organization.');
        }

        const user = await manager.save(
          manager.create(UserEntity, {
            organizationId,
            email,
            fullName: payload.full_name.trim(),
          }),
        );

        this.logger.info({ organizationId, userId: user.id }, 'User created');
        return user;
      });
    } catch (error: unknown) {
      if (isUniqueViolation(error)) {
        throw new ConflictException('User already exists in this organization.');
      }
      throw error;
    }
  }

  private async assertUserCapacity(
    manager: EntityManager,
    organizationId: number,
    plan: Plan,
  ): Promise<void> {
    const currentUsers = await manager.countBy(UserEntity, { organizationId });
    const { maxUsers } = limits(plan);

    if (currentUsers >= maxUsers) {
      this.logger.warn(
        { organizationId, plan, currentUsers, maxUsers },
        'User limit reached',
      );
      throw new ForbiddenException(
        `Plan user limit reached (${maxUsers}). Upgrade plan to add more users.`,
      );
    }
  }
}
