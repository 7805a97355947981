import { Body, Controller, Get, Post, UseGuards } from '@nestjs/common';
import {
  AuthContext,
  BearerAuthGuard,
  RequestContext,
} from '../../core/auth';
import { toSubscriptionResponse } from '../billing/dto/subscription-response.dto';
import { SubscriptionService } from '../billing/services/subscription.service';
import { CreateUserDto } from './dto/create-user.dto';
import {
  OrganizationOverviewDto,
  toOrganizationResponse,
  toUserResponse,
  UserResponseDto,
} from './dto/organization-response.dto';
import { OrganizationsService } from './organizations.service';

@Controller('organizations/me')
@UseGuards(BearerAuthGuard)
export class OrganizationsController {
  constructor(
    private readonly organizationsService: OrganizationsService,
    private readonly subscriptionService: SubscriptionService,
  ) {}

  @Get()
  async getMyOrganization(
    @AuthContext() context: RequestContext,
  ): Promise<OrganizationOverviewDto> {
    const subscription = await this.subscriptionService.findForOrganization(
      context.organization.id,
    );
    return {
      organization: toOrganizationResponse(context.organization),
      subscription: toSubscriptionResponse(subscription),
    };
  }

  @Get('users')
  async listUsers(
    @AuthContext() context: RequestContext,
  ): Promise<UserResponseDto[]> {
    const users = await this.organizationsService.listUsers(
      context.organization.id,
    );
    return users.map(toUserResponse);
  }

  @Post('users')
  async createUser(
    @AuthContext() context: RequestContext,
    @Body() payload: CreateUserDto,
  ): Promise<UserResponseDto> {
    const user = await this.organizationsService.createUser(
      context.organization.id,
      payload,
    );
    return toUserResponse(user);
  }
}
