import { Module } from '@nestjs/common';
import { CoreModule } from '../../core/core.module';
import { BillingController } from './controllers/billing.controller';
import { StripeWebhookController } from './controllers/stripe-webhook.controller';
import { SubscriptionReconcilerService } from './services/subscription-reconciler.service';
import { SubscriptionService } from './services/subscription.service';
import { WebhookIngestionService } from './services/webhook-ingestion.service';

@Module({
  imports: [CoreModule],
  controllers: [BillingController, StripeWebhookController],
  providers: [
    SubscriptionService,
    SubscriptionReconcilerService,
    WebhookIngestionService,
  ],
  exports: [SubscriptionService, SubscriptionReconcilerService],
})
export class BillingModule {}
