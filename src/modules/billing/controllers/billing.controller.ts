import { Body, Controller, Get, Patch, UseGuards } from '@nestjs/common';
import {
  AuthContext,
  BearerAuthGuard,
  RequestContext,
} from '../../../core/auth';
import { logger } from '../../../core/logger/logger.config';
import { describeCatalog } from '../../../domain/billing/catalog';
import { PlanCatalogResponseDto } from '../dto/plan-catalog-response.dto';
import { SubscriptionPatchDto } from '../dto/subscription-patch.dto';
import {
  SubscriptionResponseDto,
  toSubscriptionResponse,
} from '../dto/subscription-response.dto';
import { SubscriptionService } from '../services/subscription.service';

@Controller('billing')
export class BillingController {
  private readonly logger = logger();

  constructor(private readonly subscriptionService: SubscriptionService) {}

  @Get('plans')
  getPlanCatalog(): PlanCatalogResponseDto {
    return {
      plans: describeCatalog().map((plan) => ({
        name: plan.name,
        rank: plan.rank,
        limits: {
          max_users: plan.limits.maxUsers,
          max_projects: plan.limits.maxProjects,
        },
        features: plan.features,
      })),
    };
  }

  @Get('subscription')
  @UseGuards(BearerAuthGuard)
  async getSubscription(
    @AuthContext() context: RequestContext,
  ): Promise<SubscriptionResponseDto> {
    const subscription = await this.subscriptionService.findForOrganization(
      context.organization.id,
    );
    return toSubscriptionResponse(subscription);
  }

  @Patch('subscription')
  @UseGuards(BearerAuthGuard)
  async updateSubscription(
    @AuthContext() context: RequestContext,
    @Body() payload: SubscriptionPatchDto,
  ): Promise<SubscriptionResponseDto> {
    this.logger.info(
      {
        organizationId: context.organization.id,
        userId: context.user.id,
        plan: payload.plan,
        status: payload.status,
      },
      'Subscription override requested',
    );

    const subscription = await this.subscriptionService.updateForOrganization(
      context.organization.id,
      { plan: payload.plan, status: payload.status },
    );
    return toSubscriptionResponse(subscription);
  }
}
