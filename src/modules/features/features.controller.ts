import { Controller, Get, Param, UseGuards } from '@nestjs/common';
import {
  AuthContext,
  BearerAuthGuard,
  RequestContext,
} from '../../core/auth';
import { Feature } from '../../domain/billing/models';
import {
  AdvancedReportDto,
  FeatureAccessDto,
  FeaturesService,
} from './features.service';

@Controller()
@UseGuards(BearerAuthGuard)
export class FeaturesController {
  constructor(private readonly featuresService: FeaturesService) {}

  @Get('features/:featureKey')
  checkFeatureAccess(
    @AuthContext() context: RequestContext,
    @Param('featureKey') featureKey: string,
  ): Promise<FeatureAccessDto> {
    return this.featuresService.checkAccess(context.organization.id, featureKey);
  }

  @Get('reports/advanced')
  async advancedAnalyticsReport(
    @AuthContext() context: RequestContext,
  ): Promise<AdvancedReportDto> {
    await this.featuresService.requireFeature(
      context.organization.id,
      Feature.ADVANCED_ANALYTICS,
    );

    return {
      kpis: {
        mrr: 12800,
        churn_rate: 0.032,
        expansion_revenue: 1900,
      },
    };
  }
}
