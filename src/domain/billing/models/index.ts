/**
 * Barrel export for billing domain models
 */

export * from './billing-event.model';
export * from './plan.model';
export * from './subscription.model';
