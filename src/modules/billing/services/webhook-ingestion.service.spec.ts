import { BadRequestException, UnauthorizedException } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { createHmac } from 'node:crypto';
import { DataSource } from 'typeorm';
import {
  BillingEventEntity,
  ENTITIES,
  OrganizationEntity,
  SubscriptionEntity,
} from '../../../core/database/entities';
import { TransactionRunner } from '../../../core/database/transaction-runner';
import { PayloadValidatorService } from '../../../core/validation/payload-validator.service';
import { Plan, SubscriptionStatus } from '../../../domain/billing/models';
import { SubscriptionReconcilerService } from './subscription-reconciler.service';
import { SubscriptionService } from './subscription.service';
import { WebhookIngestionService } from './webhook-ingestion.service';

const encode = (payload: object) => Buffer.from(JSON.stringify(payload));

const subscriptionEvent = (
  id: string,
  object: Record<string, unknown>,
  type = 'customer.subscription.updated',
) => ({ id, type, data: { object } });

describe('WebhookIngestionService', () => {
  let dataSource: DataSource;
  let transactions: TransactionRunner;
  let subscriptions: SubscriptionService;
  let reconciler: SubscriptionReconcilerService;
  let organization: OrganizationEntity;

  const createService = (config: Record<string, string> = {}) =>
    new WebhookIngestionService(
      transactions,
      new ConfigService(config),
      new PayloadValidatorService(),
      reconciler,
    );

  const currentSubscription = () =>
    dataSource.manager.findOneByOrFail(SubscriptionEntity, {
      organizationId: organization.id,
    });

  beforeEach(async () => {
    dataSource = new DataSource({
      type: 'better-sqlite3',
      database: ':memory:',
      entities: ENTITIES,
      synchronize: true,
    });
    await dataSource.initialize();

    transactions = new TransactionRunner(dataSource);
    subscriptions = new SubscriptionService(transactions);
    reconciler = new SubscriptionReconcilerService(subscriptions);
    organization = await dataSource.manager.save(
      dataSource.manager.create(OrganizationEntity, { name: 'Acme', slug: 'acme' }),
    );
  });

  afterEach(async () => {
    jest.restoreAllMocks();
    await dataSource.destroy();
  });

  it('applies a subscription event and records it in the ledger', async () => {
    const service = createService();
    const result = await service.ingest({
      rawBody: encode(
        subscriptionEvent('evt_1', {
          id: 'sub_1',
          customer: 'cus_1',
          status: 'active',
          plan: { nickname: 'Enterprise' },
          current_period_end: 1767225600,
          metadata: { organization_slug: 'acme' },
        }),
      ),
    });

    expect(result).toEqual({
      status: 'processed',
      idempotency_key: 'evt_1',
      event_type: 'customer.subscription.updated',
      updated_subscription: true,
    });

    const subscription = await currentSubscription();
    expect(subscription.plan).toBe(Plan.ENTERPRISE);
    expect(subscription.status).toBe(SubscriptionStatus.ACTIVE);
    expect(subscription.stripeCustomerId).toBe('cus_1');
    expect(subscription.stripeSubscriptionId).toBe('sub_1');
    expect(subscription.currentPeriodEnd?.toISOString()).toBe(
      '2026-01-01T00:00:00.000Z',
    );

    const ledger = await dataSource.manager.find(BillingEventEntity);
    expect(ledger).toHaveLength(1);
    expect(ledger[0].organizationId).toBe(organization.id);
    expect(ledger[0].payload).toEqual(
      subscriptionEvent('evt_1', {
        id: 'sub_1',
        customer: 'cus_1',
        status: 'active',
        plan: { nickname: 'Enterprise' },
        current_period_end: 1767225600,
        metadata: { organization_slug: 'acme' },
      }),
    );
  });

  it('answers a redelivery as duplicate without reconciling again', async () => {
    const service = createService();
    const rawBody = encode(
      subscriptionEvent('evt_1', {
        status: 'active',
        metadata: { organization_slug: 'acme' },
      }),
    );
    await service.ingest({ rawBody });

    const reconcile = jest.spyOn(reconciler, 'reconcile');
    const second = await service.ingest({ rawBody });

    expect(second).toEqual({
      status: 'duplicate',
      idempotency_key: 'evt_1',
      event_type: 'customer.subscription.updated',
    });
    expect(reconcile).not.toHaveBeenCalled();
    expect(await dataSource.manager.count(BillingEventEntity)).toBe(1);
  });

  it('keeps the known plan when a later event only carries a status', async () => {
    const service = createService();
    await service.ingest({
      rawBody: encode(
        subscriptionEvent('evt_1', {
          status: 'active',
          plan: { nickname: 'Growth' },
          customer: 'cus_1',
          metadata: { organization_slug: 'acme' },
        }),
      ),
    });
    await service.ingest({
      rawBody: encode(
        subscriptionEvent(
          'evt_2',
          { status: 'unpaid', metadata: { organization_slug: 'acme' } },
          'customer.subscription.deleted',
        ),
      ),
    });

    const subscription = await currentSubscription();
    expect(subscription.plan).toBe(Plan.GROWTH);
    expect(subscription.status).toBe(SubscriptionStatus.CANCELED);
    expect(subscription.stripeCustomerId).toBe('cus_1');
  });

  it('records unknown event types without touching the subscription', async () => {
    const service = createService();
    await subscriptions.getOrCreateSubscription(
      dataSource.manager,
      organization.id,
    );
    const before = await currentSubscription();

    const result = await service.ingest({
      rawBody: encode({
        id: 'evt_invoice',
        type: 'invoice.paid',
        data: { object: { metadata: { organization_slug: 'acme' } } },
      }),
    });

    expect(result).toEqual({
      status: 'processed',
      idempotency_key: 'evt_invoice',
      event_type: 'invoice.paid',
      updated_subscription: false,
    });
    const after = await currentSubscription();
    expect(after.plan).toBe(before.plan);
    expect(after.status).toBe(before.status);
    expect(after.updatedAt.getTime()).toBe(before.updatedAt.getTime());

    const [entry] = await dataSource.manager.find(BillingEventEntity);
    expect(entry.organizationId).toBeNull();
    expect(entry.eventType).toBe('invoice.paid');
  });

  it('records events for unknown organizations with a null organization', async () => {
    const service = createService();
    const result = await service.ingest({
      rawBody: encode(
        subscriptionEvent('evt_ghost', {
          status: 'active',
          metadata: { organization_slug: 'ghost' },
        }),
      ),
    });

    expect(result).toMatchObject({ status: 'processed', updated_subscription: false });
    const [entry] = await dataSource.manager.find(BillingEventEntity);
    expect(entry.organizationId).toBeNull();
  });

  it('prefers the header event id over the payload id', async () => {
    const service = createService();
    const result = await service.ingest({
      rawBody: encode(subscriptionEvent('evt_body', {})),
      eventId: 'evt_header',
    });

    expect(result.idempotency_key).toBe('evt_header');
  });

  it('rejects payloads without any event id', async () => {
    const service = createService();

    await expect(
      service.ingest({ rawBody: encode({ type: 'invoice.paid' }) }),
    ).rejects.toBeInstanceOf(BadRequestException);
  });

  it('rejects malformed JSON and non-object payloads', async () => {
    const service = createService();

    await expect(
      service.ingest({ rawBody: Buffer.from('{"id": "evt_1"'), eventId: 'evt_1' }),
    ).rejects.toBeInstanceOf(BadRequestException);
    await expect(
      service.ingest({ rawBody: Buffer.from('["evt_1"]'), eventId: 'evt_1' }),
    ).rejects.toBeInstanceOf(BadRequestException);
    expect(await dataSource.manager.count(BillingEventEntity)).toBe(0);
  });

  describe('with a webhook secret', () => {
    const secret = 'test-secret';
    const sign = (body: Buffer) =>
      createHmac('sha256', secret).update(body).digest('hex');

    it('accepts a valid signature', async () => {
      const service = createService({ STRIPE_WEBHOOK_SECRET: secret });
      const rawBody = encode(subscriptionEvent('evt_signed', {}));

      const result = await service.ingest({ rawBody, signature: sign(rawBody) });

      expect(result.status).toBe('processed');
    });

    it('rejects a bad or missing signature before decoding the body', async () => {
      const service = createService({ STRIPE_WEBHOOK_SECRET: secret });
      const decode = jest.spyOn(PayloadValidatorService.prototype, 'decodeJsonObject');
      const rawBody = Buffer.from('not even json');

      await expect(
        service.ingest({ rawBody, signature: 'deadbeef' }),
      ).rejects.toBeInstanceOf(UnauthorizedException);
      await expect(service.ingest({ rawBody })).rejects.toBeInstanceOf(
        UnauthorizedException,
      );
      expect(decode).not.toHaveBeenCalled();
      expect(await dataSource.manager.count(BillingEventEntity)).toBe(0);
    });
  });

  it('processes one of two simultaneous identical deliveries', async () => {
    const service = createService();
    const rawBody = encode(
      subscriptionEvent('evt_same', {
        status: 'active',
        plan: { nickname: 'Enterprise' },
        metadata: { organization_slug: 'acme' },
      }),
    );

    const results = await Promise.all([
      service.ingest({ rawBody }),
      service.ingest({ rawBody }),
    ]);

    expect(results.map((result) => result.status).sort()).toEqual([
      'duplicate',
      'processed',
    ]);
    expect(await dataSource.manager.count(BillingEventEntity)).toBe(1);
    expect((await currentSubscription()).plan).toBe(Plan.ENTERPRISE);
  });

  it('processes simultaneous deliveries of different events', async () => {
    const service = createService();

    const results = await Promise.all([
      service.ingest({
        rawBody: encode(
          subscriptionEvent('evt_a', {
            plan: { nickname: 'Growth' },
            metadata: { organization_slug: 'acme' },
          }),
        ),
      }),
      service.ingest({
        rawBody: encode({ id: 'evt_b', type: 'invoice.paid', data: { object: {} } }),
      }),
    ]);

    expect(results).toEqual([
      {
        status: 'processed',
        idempotency_key: 'evt_a',
        event_type: 'customer.subscription.updated',
        updated_subscription: true,
      },
      {
        status: 'processed',
        idempotency_key: 'evt_b',
        event_type: 'invoice.paid',
        updated_subscription: false,
      },
    ]);
    expect(await dataSource.manager.count(BillingEventEntity)).toBe(2);
    expect((await currentSubscription()).plan).toBe(Plan.GROWTH);
  });

  it('degrades to duplicate when a concurrent delivery wins the ledger insert', async () => {
    const service = createService();
    await dataSource.manager.save(
      dataSource.manager.create(BillingEventEntity, {
        idempotencyKey: 'evt_race',
        eventType: 'customer.subscription.updated',
        organizationId: organization.id,
        payload: {},
      }),
    );
    // The lookup ran before the other delivery committed.
    jest.spyOn(dataSource.manager, 'findOneBy').mockResolvedValueOnce(null);

    const result = await service.ingest({
      rawBody: encode(
        subscriptionEvent('evt_race', {
          plan: { nickname: 'Enterprise' },
          metadata: { organization_slug: 'acme' },
        }),
      ),
    });

    expect(result).toEqual({
      status: 'duplicate',
      idempotency_key: 'evt_race',
      event_type: 'customer.subscription.updated',
    });
    expect(await dataSource.manager.count(BillingEventEntity)).toBe(1);
    // The losing transaction's subscription write was rolled back.
    expect(
      await dataSource.manager.findOneBy(SubscriptionEntity, {
        organizationId: organization.id,
      }),
    ).toBeNull();
  });
});
