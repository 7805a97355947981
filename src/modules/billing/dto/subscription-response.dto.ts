import { SubscriptionEntity } from '../../../core/database/entities';
import { Plan, SubscriptionStatus } from '../../../domain/billing/models';

export interface SubscriptionResponseDto {
  plan: Plan;
  status: SubscriptionStatus;
  stripe_customer_id: string | null;
  stripe_subscription_id: string | null;
  current_period_end: string | null;
  updated_at: string;
}

export const toSubscriptionResponse = (
  subscription: SubscriptionEntity,
): SubscriptionResponseDto => ({
  plan: subscription.plan,
  status: subscription.status,
  stripe_customer_id: subscription.stripeCustomerId,
  stripe_subscription_id: subscription.stripeSubscriptionId,
  current_period_end: subscription.currentPeriodEnd
    ? subscription.currentPeriodEnd.toISOString()
    : null,
  updated_at: subscription.updatedAt.toISOString(),
});
