/**
 * Plan and feature vocabulary
 *
 * Both sets are closed: anything arriving from outside (webhooks, URLs) is
 * checked against these enums before it reaches a gating decision.
 */

/**
 * Subscription tiers, ordered by rank in the catalog
 */
export enum Plan {
  STARTER = 'starter',
  GROWTH = 'growth',
  ENTERPRISE = 'enterprise',
}

/**
 * Gated capabilities
 */
export enum Feature {
  TEAM_MANAGEMENT = 'team_management',
  BASIC_ANALYTICS = 'basic_analytics',
  PRIORITY_SUPPORT = 'priority_support',
  ADVANCED_ANALYTICS = 'advanced_analytics',
  API_ACCESS = 'api_access',
  SSO = 'sso',
}

export interface PlanLimits {
  maxUsers: number;
  maxProjects: number;
}

/**
 * Catalog entry as exposed by GET /billing/plans
 */
export interface PlanDescription {
  name: Plan;
  rank: number;
  limits: Readonly<PlanLimits>;
  features: Feature[];
}
