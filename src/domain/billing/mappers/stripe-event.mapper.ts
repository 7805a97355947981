/**
 * Stripe Event Mapper
 *
 * Converts untrusted Stripe subscription event payloads into the closed
 * plan/status vocabulary and a sparse subscription patch. Every function here
 * is total: unexpected shapes yield `null` or an empty patch, never an error.
 */

import { isPlan } from '../catalog';
import {
  JsonObject,
  Plan,
  SubscriptionEventType,
  SubscriptionPatch,
  SubscriptionStatus,
  UNKNOWN_EVENT_TYPE,
} from '../models';

export class StripeEventMapper {
  private static readonly LIFECYCLE_EVENTS: readonly string[] =
    Object.values(SubscriptionEventType);

  /**
   * Plan keywords checked in order; the first substring hit wins
   */
  private static readonly PLAN_KEYWORDS: ReadonlyArray<[string[], Plan]> = [
    [['enterprise'], Plan.ENTERPRISE],
    [['growth', 'pro'], Plan.GROWTH],
    [['starter', 'basic'], Plan.STARTER],
  ];

  private static readonly STATUS_MAP: Readonly<Record<string, SubscriptionStatus>> = {
    trialing: SubscriptionStatus.TRIALING,
    active: SubscriptionStatus.ACTIVE,
    canceled: SubscriptionStatus.CANCELED,
    unpaid: SubscriptionStatus.CANCELED,
    past_due: SubscriptionStatus.CANCELED,
    incomplete: SubscriptionStatus.CANCELED,
    incomplete_expired: SubscriptionStatus.CANCELED,
  };

  /**
   * Map a free-text plan name ("Enterprise Annual", "Pro", ...) to a Plan
   */
  static normalizePlan(value: unknown): Plan | null {
    if (typeof value !== 'string') return null;
    const normalized = value.trim().toLowerCase();
    if (!normalized) return null;

    for (const [keywords, plan] of this.PLAN_KEYWORDS) {
      if (keywords.some((keyword) => normalized.includes(keyword))) {
        return plan;
      }
    }

    return isPlan(normalized) ? normalized : null;
  }

  static normalizeStatus(value: unknown): SubscriptionStatus | null {
    if (typeof value !== 'string') return null;
    const normalized = value.trim().toLowerCase();
    return Object.hasOwn(this.STATUS_MAP, normalized)
      ? this.STATUS_MAP[normalized]
      : null;
  }

  static eventType(event: JsonObject): string {
    return this.readString(event.type) ?? UNKNOWN_EVENT_TYPE;
  }

  static isLifecycleEvent(event: JsonObject): boolean {
    return this.LIFECYCLE_EVENTS.includes(this.eventType(event));
  }

  /**
   * Event id carried in the payload body, used when no header supplies one
   */
  static eventId(event: JsonObject): string | null {
    return this.readString(event.id);
  }

  static organizationSlug(event: JsonObject): string | null {
    return this.readString(this.metadata(event).organization_slug);
  }

  /**
   * Build the sparse patch: a field is present only when the event carries a
   * value that normalizes.
   */
  static toSubscriptionPatch(event: JsonObject): SubscriptionPatch {
    const object = this.eventObject(event);
    const patch: SubscriptionPatch = {};

    const plan = this.normalizePlan(
      this.firstString(
        this.asObject(object.plan).nickname,
        this.metadata(event).plan,
        object.plan_name,
      ),
    );
    if (plan) patch.plan = plan;

    const status = this.normalizeStatus(object.status);
    if (status) patch.status = status;

    const customerId = this.readString(object.customer);
    if (customerId) patch.stripeCustomerId = customerId;

    const subscriptionId = this.readString(object.id);
    if (subscriptionId) patch.stripeSubscriptionId = subscriptionId;

    const periodEnd = this.toTimestamp(object.current_period_end);
    if (periodEnd) patch.currentPeriodEnd = periodEnd;

    return patch;
  }

  /**
   * Epoch seconds to a UTC Date; only integers are accepted
   */
  static toTimestamp(value: unknown): Date | null {
    if (typeof value !== 'number' || !Number.isSafeInteger(value)) return null;
    const date = new Date(value * 1000);
    return Number.isNaN(date.getTime()) ? null : date;
  }

  private static eventObject(event: JsonObject): JsonObject {
    return this.asObject(this.asObject(event.data).object);
  }

  private static metadata(event: JsonObject): JsonObject {
    return this.asObject(this.eventObject(event).metadata);
  }

  private static asObject(value: unknown): JsonObject {
    if (typeof value !== 'object' || value === null || Array.isArray(value)) {
      return {};
    }
    return Object.fromEntries(Object.entries(value));
  }

  private static firstString(...values: unknown[]): string | null {
    for (const value of values) {
      if (typeof value === 'string' && value.length > 0) return value;
    }
    return null;
  }

  /**
   * Non-empty string, with numeric ids stringified
   */
  private static readString(value: unknown): string | null {
    if (typeof value === 'string') return value.length > 0 ? value : null;
    if (typeof value === 'number' && Number.isFinite(value)) return String(value);
    return null;
  }
}
