import { Injectable } from '@nestjs/common';
import { EntityManager } from 'typeorm';
import { OrganizationEntity } from '../../../core/database/entities';
import { logger } from '../../../core/logger/logger.config';
import { StripeEventMapper } from '../../../domain/billing/mappers/stripe-event.mapper';
import { JsonObject, ReconcileResult } from '../../../domain/billing/models';
import { SubscriptionService } from './subscription.service';

const notApplicable = (): ReconcileResult => ({
  updated: false,
  organizationId: null,
  appliedFields: [],
});

/**
 * Applies a Stripe subscription lifecycle event to the tenant's subscription.
 *
 * Fields are merged independently: a status-only event keeps the known plan,
 * customer and period data.
 */
@Injectable()
export class SubscriptionReconcilerService {
  private readonly logger = logger();

  constructor(private readonly subscriptionService: SubscriptionService) {}

  async reconcile(
    manager: EntityManager,
    event: JsonObject,
  ): Promise<ReconcileResult> {
    const eventType = StripeEventMapper.eventType(event);
    if (!StripeEventMapper.isLifecycleEvent(event)) {
      this.logger.info({ eventType }, 'Ignoring non-subscription event');
      return notApplicable();
    }

    const slug = StripeEventMapper.organizationSlug(event);
    if (!slug) {
      this.logger.warn({ eventType }, 'Event carries no organization slug');
      return notApplicable();
    }

    const organization = await manager.findOneBy(OrganizationEntity, { slug });
    if (!organization) {
      this.logger.warn({ eventType, slug }, 'Event organization not found');
      return notApplicable();
    }

    const subscription = await this.subscriptionService.getOrCreateSubscription(
      manager,
      organization.id,
    );
    const appliedFields = await this.subscriptionService.applyPatch(
      manager,
      subscription,
      StripeEventMapper.toSubscriptionPatch(event),
    );

    this.logger.info(
      { eventType, organizationId: organization.id, appliedFields },
      'Subscription event reconciled',
    );

    return { updated: true, organizationId: organization.id, appliedFields };
  }
}
