import { ApiTokenEntity } from './api-token.entity';
import { BillingEventEntity } from './billing-event.entity';
import { OrganizationEntity } from './organization.entity';
import { SubscriptionEntity } from './subscription.entity';
import { UserEntity } from './user.entity';

export {
  ApiTokenEntity,
  BillingEventEntity,
  OrganizationEntity,
  SubscriptionEntity,
  UserEntity,
};

export const ENTITIES = [
  OrganizationEntity,
  UserEntity,
  ApiTokenEntity,
  SubscriptionEntity,
  BillingEventEntity,
];
