import { Feature, Plan, PlanDescription, PlanLimits } from '../models';

export const PLAN_RANK: Readonly<Record<Plan, number>> = {
  [Plan.STARTER]: 1,
  [Plan.GROWTH]: 2,
  [Plan.ENTERPRISE]: 3,
};

export const PLAN_LIMITS: Readonly<Record<Plan, Readonly<PlanLimits>>> =
  Object.freeze({
    [Plan.STARTER]: Object.freeze({ maxUsers: 5, maxProjects: 10 }),
    [Plan.GROWTH]: Object.freeze({ maxUsers: 50, maxProjects: 100 }),
    [Plan.ENTERPRISE]: Object.freeze({ maxUsers: 500, maxProjects: 1000 }),
  });

export const FEATURE_MIN_PLAN: Readonly<Record<Feature, Plan>> = {
  [Feature.TEAM_MANAGEMENT]: Plan.STARTER,
  [Feature.BASIC_ANALYTICS]: Plan.STARTER,
  [Feature.PRIORITY_SUPPORT]: Plan.GROWTH,
  [Feature.ADVANCED_ANALYTICS]: Plan.GROWTH,
  [Feature.API_ACCESS]: Plan.ENTERPRISE,
  [Feature.SSO]: Plan.ENTERPRISE,
};

const PLANS: readonly Plan[] = Object.values(Plan);
const FEATURES: readonly Feature[] = Object.values(Feature);

export function isPlan(value: unknown): value is Plan {
  return PLANS.some((plan) => plan === value);
}

export function isFeature(value: unknown): value is Feature {
  return FEATURES.some((feature) => feature === value);
}

export function rank(plan: Plan): number {
  return PLAN_RANK[plan];
}

export function limits(plan: Plan): Readonly<PlanLimits> {
  return PLAN_LIMITS[plan];
}

export function minPlanFor(feature: Feature): Plan {
  return FEATURE_MIN_PLAN[feature];
}

/**
 * Entitlement decision for a (plan, feature) pair.
 *
 * Accepts raw strings: an unknown plan or feature key denies access instead of
 * failing the caller.
 */
export function planAllowsFeature(plan: string, feature: string): boolean {
  if (!isPlan(plan) || !isFeature(feature)) {
    return false;
  }
  return rank(plan) >= rank(minPlanFor(feature));
}

/**
 * Feature keys unlocked by a plan, sorted alphabetically
 */
export function featuresFor(plan: Plan): Feature[] {
  return FEATURES.filter((feature) => planAllowsFeature(plan, feature)).sort();
}

export function describeCatalog(): PlanDescription[] {
  return [...PLANS]
    .sort((a, b) => rank(a) - rank(b))
    .map((plan) => ({
      name: plan,
      rank: rank(plan),
      limits: limits(plan),
      features: featuresFor(plan),
    }));
}
