import {
  BadRequestException,
  Injectable,
  UnauthorizedException,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { EntityManager } from 'typeorm';
import { isUniqueViolation } from '../../../core/database/database-errors';
import { BillingEventEntity } from '../../../core/database/entities';
import { TransactionRunner } from '../../../core/database/transaction-runner';
import { logger } from '../../../core/logger/logger.config';
import { verifyHmacSignature } from '../../../core/security/signature.util';
import { PayloadValidatorService } from '../../../core/validation/payload-validator.service';
import { StripeEventMapper } from '../../../domain/billing/mappers/stripe-event.mapper';
import { WebhookIngestionResult } from '../../../domain/billing/models';
import { SubscriptionReconcilerService } from './subscription-reconciler.service';

export interface InboundWebhook {
  rawBody: Buffer;
  eventId?: string;
  signature?: string;
}

/**
 * Entry point for Stripe webhook deliveries.
 *
 * Signature → decode → idempotency lookup → reconcile + ledger insert in a
 * single transaction. A delivery whose key is already in the ledger, or that
 * loses the insert race to an identical concurrent delivery, is answered as
 * a duplicate.
 */
@Injectable()
export class WebhookIngestionService {
  private readonly logger = logger();

  constructor(
    private readonly transactions: TransactionRunner,
    private readonly configService: ConfigService,
    private readonly payloadValidator: PayloadValidatorService,
    private readonly reconciler: SubscriptionReconcilerService,
  ) {}

  async ingest(webhook: InboundWebhook): Promise<WebhookIngestionResult> {
    const secret = this.configService.get<string>('STRIPE_WEBHOOK_SECRET');
    if (!verifyHmacSignature(webhook.rawBody, webhook.signature, secret)) {
      this.logger.warn(
        { hasSignature: Boolean(webhook.signature), eventId: webhook.eventId },
        'Rejected webhook with invalid signature',
      );
      throw new UnauthorizedException('Invalid webhook signature.');
    }

    const payload = this.payloadValidator.decodeJsonObject(webhook.rawBody);
    const eventType = StripeEventMapper.eventType(payload);

    const idempotencyKey = webhook.eventId || StripeEventMapper.eventId(payload);
    if (!idempotencyKey) {
      this.logger.warn({ eventType }, 'Webhook has no event id');
      throw new BadRequestException('Missing event id for idempotency.');
    }

    const existing = await this.transactions.read((manager) =>
      this.findLedgerEntry(manager, idempotencyKey),
    );
    if (existing) {
      this.logger.info(
        { idempotencyKey, eventType: existing.eventType },
        'Duplicate webhook delivery',
      );
      return this.duplicate(existing);
    }

    try {
      const updated = await this.transactions.run(async (manager) => {
        const result = await this.reconciler.reconcile(manager, payload);

        await manager.save(
          manager.create(BillingEventEntity, {
            idempotencyKey,
            eventType,
            organizationId: result.organizationId,
            payload,
          }),
        );

        return result.updated;
      });

      this.logger.info(
        { idempotencyKey, eventType, updatedSubscription: updated },
        'Webhook processed',
      );

      return {
        status: 'processed',
        idempotency_key: idempotencyKey,
        event_type: eventType,
        updated_subscription: updated,
      };
    } catch (error: unknown) {
      if (!isUniqueViolation(error)) {
        this.logger.error(
          {
            idempotencyKey,
            eventType,
            error: error instanceof Error ? error.message : String(error),
          },
          'Webhook processing failed',
        );
        throw error;
      }

      const winner = await this.transactions.read((manager) =>
        this.findLedgerEntry(manager, idempotencyKey),
      );
      if (!winner) throw error;

      this.logger.info(
        { idempotencyKey, eventType },
        'Concurrent duplicate webhook delivery',
      );
      return this.duplicate(winner);
    }
  }

  private findLedgerEntry(
    manager: EntityManager,
    idempotencyKey: string,
  ): Promise<BillingEventEntity | null> {
    return manager.findOneBy(BillingEventEntity, { idempotencyKey });
  }

  private duplicate(entry: BillingEventEntity): WebhookIngestionResult {
    return {
      status: 'duplicate',
      idempotency_key: entry.idempotencyKey,
      event_type: entry.eventType,
    };
  }
}
