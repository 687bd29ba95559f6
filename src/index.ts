// Core domain
export * from './core-domain';

// Planner engine
export * from './planner/input';
export * from './planner/errors';
export * from './planner/time-of-day';
export * from './planner/placement-policy';
export * from './planner/item-normalizer';
export * from './planner/plan-assembler';
export * from './planner/plan-summary';
export * from './planner/plan-validator';
export * from './planner/plan-document';
export * from './planner/schedule-analysis';
export * from './planner/consolidate-day';

// Connectors
export * from './connectors/interfaces';
export * from './connectors/static';
export * from './connectors/json-file';
export * from './connectors/ics';

// Services
export { DailyPlannerService } from './services/daily-planner.service';
export type {
  DailyPlannerServiceOptions,
  PlannerRunResult,
  ProducerFailure,
} from './services/daily-planner.service';
export * from './services/plan-request.handler';

// Ambient
export * from './config/settings';
export * from './logging/logger';
