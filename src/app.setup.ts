import { HttpStatus, ValidationPipe } from '@nestjs/common';
import type { NestExpressApplication } from '@nestjs/platform-express';
import { json, raw } from 'express';
import { STRIPE_WEBHOOK_PATH } from './modules/billing/controllers/stripe-webhook.controller';

/**
 * Shared by bootstrap and the e2e tests. The app must be created with
 * `bodyParser: false`: the webhook route receives its body as raw bytes and
 * every other route as parsed JSON.
 */
export function configureApp(app: NestExpressApplication): NestExpressApplication {
  app.use(STRIPE_WEBHOOK_PATH, raw({ type: () => true, limit: '1mb' }));
  app.use(json({ limit: '1mb' }));

  app.useGlobalPipes(
    new ValidationPipe({
      whitelist: true,
      forbidNonWhitelisted: true,
      transform: true,
      errorHttpStatusCode: HttpStatus.UNPROCESSABLE_ENTITY,
    }),
  );

  return app;
}
