import { Feature, Plan } from '../models';
import {
  describeCatalog,
  featuresFor,
  isFeature,
  isPlan,
  limits,
  minPlanFor,
  planAllowsFeature,
  rank,
} from './plan-catalog';

const PLANS = Object.values(Plan);
const FEATURES = Object.values(Feature);

describe('plan catalog', () => {
  it('ranks plans starter < growth < enterprise', () => {
    expect(rank(Plan.STARTER)).toBe(1);
    expect(rank(Plan.GROWTH)).toBe(2);
    expect(rank(Plan.ENTERPRISE)).toBe(3);
  });

  it('exposes per-plan limits', () => {
    expect(limits(Plan.STARTER)).toEqual({ maxUsers: 5, maxProjects: 10 });
    expect(limits(Plan.GROWTH)).toEqual({ maxUsers: 50, maxProjects: 100 });
    expect(limits(Plan.ENTERPRISE)).toEqual({ maxUsers: 500, maxProjects: 1000 });
  });

  it('hands out limits that callers cannot change', () => {
    for (const plan of PLANS) {
      const planLimits = limits(plan);
      expect(Object.isFrozen(planLimits)).toBe(true);
      expect(() => Object.assign(planLimits, { maxUsers: 0 })).toThrow(TypeError);
    }
    expect(limits(Plan.STARTER).maxUsers).toBe(5);
    expect(describeCatalog()[0].limits).toEqual({ maxUsers: 5, maxProjects: 10 });
  });

  it('maps features to their minimum plan', () => {
    expect(minPlanFor(Feature.TEAM_MANAGEMENT)).toBe(Plan.STARTER);
    expect(minPlanFor(Feature.ADVANCED_ANALYTICS)).toBe(Plan.GROWTH);
    expect(minPlanFor(Feature.SSO)).toBe(Plan.ENTERPRISE);
  });

  it('recognizes only catalog members', () => {
    expect(isPlan('growth')).toBe(true);
    expect(isPlan('Growth')).toBe(false);
    expect(isPlan('platinum')).toBe(false);
    expect(isPlan(3)).toBe(false);
    expect(isFeature('sso')).toBe(true);
    expect(isFeature('time_travel')).toBe(false);
  });
});

describe('planAllowsFeature', () => {
  it('compares plan rank against the feature minimum', () => {
    expect(planAllowsFeature('starter', 'basic_analytics')).toBe(true);
    expect(planAllowsFeature('starter', 'advanced_analytics')).toBe(false);
    expect(planAllowsFeature('growth', 'advanced_analytics')).toBe(true);
    expect(planAllowsFeature('growth', 'api_access')).toBe(false);
    expect(planAllowsFeature('enterprise', 'sso')).toBe(true);
  });

  it('denies unknown plans and features instead of throwing', () => {
    expect(planAllowsFeature('platinum', 'basic_analytics')).toBe(false);
    expect(planAllowsFeature('enterprise', 'time_travel')).toBe(false);
    expect(planAllowsFeature('', '')).toBe(false);
  });

  it('is monotonic in plan rank', () => {
    for (const higher of PLANS) {
      for (const lower of PLANS) {
        if (rank(higher) < rank(lower)) continue;
        for (const feature of FEATURES) {
          if (planAllowsFeature(lower, feature)) {
            expect(planAllowsFeature(higher, feature)).toBe(true);
          }
        }
      }
    }
  });
});

describe('describeCatalog', () => {
  it('lists plans by rank with sorted feature keys', () => {
    expect(describeCatalog()).toEqual([
      {
        name: Plan.STARTER,
        rank: 1,
        limits: { maxUsers: 5, maxProjects: 10 },
        features: ['basic_analytics', 'team_management'],
      },
      {
        name: Plan.GROWTH,
        rank: 2,
        limits: { maxUsers: 50, maxProjects: 100 },
        features: [
          'advanced_analytics',
          'basic_analytics',
          'priority_support',
          'team_management',
        ],
      },
      {
        name: Plan.ENTERPRISE,
        rank: 3,
        limits: { maxUsers: 500, maxProjects: 1000 },
        features: [
          'advanced_analytics',
          'api_access',
          'basic_analytics',
          'priority_support',
          'sso',
          'team_management',
        ],
      },
    ]);
  });

  it('unlocks every feature on the top plan', () => {
    expect(featuresFor(Plan.ENTERPRISE)).toHaveLength(FEATURES.length);
  });
});
