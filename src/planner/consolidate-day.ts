import { PlannerConfigSchema, type PlannerConfig } from '../core-domain/planner-config';
import type { DailyPlan } from '../core-domain/daily-plan';
import { silentLogger, type Logger } from '../logging/logger';
import { ConfigurationError, PlanValidationError } from './errors';
import type { ConsolidationInput } from './input';
import { normalizeRecords, type RecordRejection } from './item-normalizer';
import { assembleDailyPlan } from './plan-assembler';
import { validatePlan } from './plan-validator';
import { analyzeSchedule, type CalendarConflict, type FreeSlot } from './schedule-analysis';
import { isCalendarDate } from './time-of-day';

export interface ConsolidationOptions {
  config?: Partial<PlannerConfig>;
  logger?: Logger;
}

export interface ConsolidationResult {
  plan: DailyPlan;
  // Records that could not be normalized; the plan was built without them
  rejected: RecordRejection[];
  // Overlapping event pairs; reported only, the plan keeps them all
  conflicts: CalendarConflict[];
  freeSlots: FreeSlot[];
}

export function resolvePlannerConfig(raw?: Partial<PlannerConfig>): PlannerConfig {
  const parsed = PlannerConfigSchema.safeParse({ ...raw });
  if (!parsed.success) {
    throw new ConfigurationError(
      parsed.error.issues.map((issue) => `${issue.path.map(String).join('.')}: ${issue.message}`)
    );
  }
  return parsed.data;
}

/**
 * Normalizes, orders, summarizes and validates one day's collaborator records,
 * then looks for overlapping events and free working time.
 *
 * Synchronous and side-effect free apart from logging. Malformed records are
 * skipped and reported in `rejected`; a plan that breaks an invariant throws
 * `PlanValidationError` and nothing is returned.
 *
 * @example
 * ```typescript
 * const { plan, rejected } = consolidateDay({
 *   date: '2025-01-15',
 *   calendar: [{ start: '2025-01-15T10:00:00Z', end: '2025-01-15T11:00:00Z', summary: 'Standup' }],
 *   email: [{ description: 'Send report', priority: 'urgent', source_email_id: 'msg-1' }],
 *   context: [{ kind: 'weather', detail_payload: { description: 'Rain' }, impact_label: 'morning' }],
 * });
 * ```
 */
export function consolidateDay(
  input: ConsolidationInput,
  options: ConsolidationOptions = {}
): ConsolidationResult {
  const config = resolvePlannerConfig(options.config);
  const logger = options.logger ?? silentLogger;
  const { date } = input;

  if (!isCalendarDate(date)) {
    throw new PlanValidationError([`date ${JSON.stringify(date)} is not a well-formed calendar date`]);
  }

  const records = {
    calendar: input.calendar ?? [],
    email: input.email ?? [],
    context: input.context ?? [],
  };
  const received = records.calendar.length + records.email.length + records.context.length;
  if (received === 0) {
    logger.info('Consolidation', `No records received for ${date}; the plan will be empty`);
  }

  const { items, rejected } = normalizeRecords(records, date, config);
  logger.debug('Normalizer', `Normalized ${items.length} of ${received} record(s)`);
  for (const rejection of rejected) {
    logger.warn(
      'Normalizer',
      `Skipped ${rejection.source} record #${rejection.index}: ${rejection.reason}`
    );
  }

  const plan = validatePlan(assembleDailyPlan(date, items));
  logger.debug('Consolidation', plan.summary);

  const { conflicts, freeSlots } = analyzeSchedule(plan);
  for (const conflict of conflicts) {
    logger.warn('Schedule', `Conflict detected: ${conflict.details}`);
  }

  return { plan, rejected, conflicts, freeSlots };
}
