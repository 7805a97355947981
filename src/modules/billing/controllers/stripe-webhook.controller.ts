import {
  Controller,
  Headers,
  HttpCode,
  HttpStatus,
  Post,
  Req,
} from '@nestjs/common';
import type { Request } from 'express';
import { WebhookIngestionResult } from '../../../domain/billing/models';
import { WebhookIngestionService } from '../services/webhook-ingestion.service';

export const STRIPE_WEBHOOK_PATH = '/billing/webhooks/stripe';

/**
 * The body arrives unparsed (see configureApp): the signature is computed
 * over the exact bytes Stripe sent.
 */
@Controller('billing/webhooks')
export class StripeWebhookController {
  constructor(private readonly ingestionService: WebhookIngestionService) {}

  @Post('stripe')
  @HttpCode(HttpStatus.OK)
  async receive(
    @Req() request: Request,
    @Headers('x-stripe-event-id') eventId?: string,
    @Headers('x-stripe-signature') signature?: string,
  ): Promise<WebhookIngestionResult> {
    const body: unknown = request.body;
    const rawBody = Buffer.isBuffer(body) ? body : Buffer.alloc(0);

    return this.ingestionService.ingest({ rawBody, eventId, signature });
  }
}
