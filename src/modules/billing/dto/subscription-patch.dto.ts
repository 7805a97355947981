import { IsEnum, ValidateIf } from 'class-validator';
import { Plan, SubscriptionStatus } from '../../../domain/billing/models';

export class SubscriptionPatchDto {
  @IsEnum(Plan)
  plan!: Plan;

  // Absent means active; an explicit null is rejected.
  @ValidateIf((_, value) => value !== undefined)
  @IsEnum(SubscriptionStatus)
  status: SubscriptionStatus = SubscriptionStatus.ACTIVE;
}
