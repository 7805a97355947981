import { Injectable } from '@nestjs/common';
import { HealthIndicator, HealthIndicatorResult } from '@nestjs/terminus';
import { DataSource } from 'typeorm';
import { BillingEventEntity } from '../../core/database/entities';

@Injectable()
export class HealthService extends HealthIndicator {
  constructor(private readonly dataSource: DataSource) {
    super();
  }

  /**
   * Reports ledger size and the time of the most recent webhook
   */
  async checkLedger(): Promise<HealthIndicatorResult> {
    const repository = this.dataSource.getRepository(BillingEventEntity);
    const [events, latest] = await Promise.all([
      repository.count(),
      repository.findOne({ where: {}, order: { receivedAt: 'DESC' } }),
    ]);

    return this.getStatus('billing-ledger', true, {
      events,
      lastReceivedAt: latest ? latest.receivedAt.toISOString() : null,
    });
  }
}
