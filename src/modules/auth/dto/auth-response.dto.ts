import { SubscriptionResponseDto } from '../../billing/dto/subscription-response.dto';
import {
  OrganizationResponseDto,
  UserResponseDto,
} from '../../organizations/dto/organization-response.dto';

export interface TokenResponseDto {
  access_token: string;
  token_type: 'bearer';
}

export interface AuthResponseDto extends TokenResponseDto {
  organization: OrganizationResponseDto;
  user: UserResponseDto;
  subscription: SubscriptionResponseDto;
}
