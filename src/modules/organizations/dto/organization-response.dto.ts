import {
  OrganizationEntity,
  UserEntity,
} from '../../../core/database/entities';
import { SubscriptionResponseDto } from '../../billing/dto/subscription-response.dto';

export interface OrganizationResponseDto {
  id: number;
  name: string;
  slug: string;
  created_at: string;
}

export interface UserResponseDto {
  id: number;
  email: string;
  full_name: string;
  created_at: string;
}

export interface OrganizationOverviewDto {
  organization: OrganizationResponseDto;
  subscription: SubscriptionResponseDto;
}

export const toOrganizationResponse = (
  organization: OrganizationEntity,
): OrganizationResponseDto => ({
  id: organization.id,
  name: organization.name,
  slug: organization.slug,
  created_at: organization.createdAt.toISOString(),
});

export const toUserResponse = (user: UserEntity): UserResponseDto => ({
  id: user.id,
  email: user.email,
  full_name: user.fullName,
  created_at: user.createdAt.toISOString(),
});
