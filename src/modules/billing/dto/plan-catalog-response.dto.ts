import { Feature, Plan } from '../../../domain/billing/models';

export interface PlanCatalogItemDto {
  name: Plan;
  rank: number;
  limits: {
    max_users: number;
    max_projects: number;
  };
  features: Feature[];
}

export interface PlanCatalogResponseDto {
  plans: PlanCatalogItemDto[];
}
