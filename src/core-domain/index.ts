/**
 * Domain Models Export
 *
 * Plan items, daily plans and planner configuration.
 */

// Plan Item
export * from './plan-item';

// Daily Plan
export * from './daily-plan';

// Planner Configuration
export * from './planner-config';
