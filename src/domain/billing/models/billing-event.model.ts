export type JsonObject = Record<string, unknown>;

/**
 * Subscription lifecycle events the reconciler acts on
 */
export enum SubscriptionEventType {
  CREATED = 'customer.subscription.created',
  UPDATED = 'customer.subscription.updated',
  DELETED = 'customer.subscription.deleted',
}

export const UNKNOWN_EVENT_TYPE = 'unknown';

export interface ReconcileResult {
  /**
   * True once the event was applicable and its organization resolved,
   * whether or not any field value changed
   */
  updated: boolean;
  organizationId: number | null;
  appliedFields: string[];
}

export type WebhookIngestionResult =
  | {
      status: 'duplicate';
      idempotency_key: string;
      event_type: string;
    }
  | {
      status: 'processed';
      idempotency_key: string;
      event_type: string;
      updated_subscription: boolean;
    };
