import { Injectable } from '@nestjs/common';
import { EntityManager } from 'typeorm';
import { isUniqueViolation } from '../../../core/database/database-errors';
import { SubscriptionEntity } from '../../../core/database/entities';
import { TransactionRunner } from '../../../core/database/transaction-runner';
import { logger } from '../../../core/logger/logger.config';
import { mergeDefined } from '../../../core/utils/merge-defined.util';
import {
  DEFAULT_PLAN,
  DEFAULT_STATUS,
  SubscriptionPatch,
} from '../../../domain/billing/models';

@Injectable()
export class SubscriptionService {
  private readonly logger = logger();

  constructor(private readonly transactions: TransactionRunner) {}

  /**
   * Returns the organization's subscription, creating the default
   * starter/trialing row on first access.
   *
   * The insert runs in a nested transaction (a savepoint inside an outer
   * one), so losing the race on the unique organization_id leaves the outer
   * transaction usable and the winner's row is read back.
   */
  async getOrCreateSubscription(
    manager: EntityManager,
    organizationId: number,
  ): Promise<SubscriptionEntity> {
    const existing = await manager.findOneBy(SubscriptionEntity, {
      organizationId,
    });
    if (existing) return existing;

    const subscription = manager.create(SubscriptionEntity, {
      organizationId,
      plan: DEFAULT_PLAN,
      status: DEFAULT_STATUS,
      stripeCustomerId: null,
      stripeSubscriptionId: null,
      currentPeriodEnd: null,
      updatedAt: new Date(),
    });

    try {
      return await manager.transaction((inner) => inner.save(subscription));
    } catch (error: unknown) {
      if (!isUniqueViolation(error)) throw error;

      const winner = await manager.findOneBy(SubscriptionEntity, {
        organizationId,
      });
      if (!winner) throw error;
      return winner;
    }
  }

  /**
   * Applies the present fields of `patch` and persists the row when anything
   * was applied. Returns the applied field names.
   */
  async applyPatch(
    manager: EntityManager,
    subscription: SubscriptionEntity,
    patch: SubscriptionPatch,
  ): Promise<string[]> {
    const applied = mergeDefined<SubscriptionEntity>(subscription, patch);
    if (applied.length > 0) {
      subscription.updatedAt = new Date();
      await manager.save(subscription);
    }
    return applied;
  }

  /**
   * Transactional because the first access may insert the default row
   */
  async findForOrganization(organizationId: number): Promise<SubscriptionEntity> {
    return this.transactions.run((manager) =>
      this.getOrCreateSubscription(manager, organizationId),
    );
  }

  /**
   * Administrative override; values arrive already validated against the enums
   */
  async updateForOrganization(
    organizationId: number,
    patch: SubscriptionPatch,
  ): Promise<SubscriptionEntity> {
    return this.transactions.run(async (manager) => {
      const subscription = await this.getOrCreateSubscription(
        manager,
        organizationId,
      );
      const applied = await this.applyPatch(manager, subscription, patch);

      this.logger.info(
        {
          organizationId,
          appliedFields: applied,
          plan: subscription.plan,
          status: subscription.status,
        },
        'Subscription updated by administrative override',
      );

      return subscription;
    });
  }
}
