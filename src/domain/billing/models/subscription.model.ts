import { Plan } from './plan.model';

/**
 * Subscription status
 *
 * Provider states outside this set (unpaid, past_due, ...) collapse to
 * CANCELED during normalization.
 */
export enum SubscriptionStatus {
  TRIALING = 'trialing',
  ACTIVE = 'active',
  CANCELED = 'canceled',
}

export const DEFAULT_PLAN = Plan.STARTER;
export const DEFAULT_STATUS = SubscriptionStatus.TRIALING;

/**
 * Mutable billing state of one organization
 */
export interface SubscriptionState {
  plan: Plan;
  status: SubscriptionStatus;
  stripeCustomerId: string | null;
  stripeSubscriptionId: string | null;
  currentPeriodEnd: Date | null;
}

/**
 * Sparse update extracted from a provider event.
 * Only fields the event actually resolved are present.
 */
export type SubscriptionPatch = Partial<SubscriptionState>;
