import { HttpException, HttpStatus, Injectable, NotFoundException } from '@nestjs/common';
import { logger } from '../../core/logger/logger.config';
import {
  isFeature,
  minPlanFor,
  planAllowsFeature,
} from '../../domain/billing/catalog';
import { Feature, Plan } from '../../domain/billing/models';
import { SubscriptionService } from '../billing/services/subscription.service';

export interface FeatureAccessDto {
  feature: Feature;
  plan: Plan;
  required_plan: Plan;
  allowed: boolean;
}

export interface AdvancedReportDto {
  kpis: {
    mrr: number;
    churn_rate: number;
    expansion_revenue: number;
  };
}

@Injectable()
export class FeaturesService {
  private readonly logger = logger();

  constructor(private readonly subscriptionService: SubscriptionService) {}

  async checkAccess(
    organizationId: number,
    featureKey: string,
  ): Promise<FeatureAccessDto> {
    if (!isFeature(featureKey)) {
      throw new NotFoundException('Unknown feature.');
    }

    const { plan } = await this.subscriptionService.findForOrganization(
      organizationId,
    );
    return {
      feature: featureKey,
      plan,
      required_plan: minPlanFor(featureKey),
      allowed: planAllowsFeature(plan, featureKey),
    };
  }

  /**
   * Throws 402 unless the organization's plan unlocks `feature`
   */
  async requireFeature(organizationId: number, feature: Feature): Promise<void> {
    const { plan } = await this.subscriptionService.findForOrganization(
      organizationId,
    );
    if (planAllowsFeature(plan, feature)) return;

    this.logger.info({ organizationId, plan, feature }, 'Feature access denied');
    throw new HttpException(
      `${feature} requires ${this.displayName(minPlanFor(feature))} plan or higher.`,
      HttpStatus.PAYMENT_REQUIRED,
    );
  }

  private displayName(plan: Plan): string {
    return plan.charAt(0).toUpperCase() + plan.slice(1);
  }
}
