/**
 * Daily Planner Service
 *
 * Runs one planning cycle: asks the calendar, email and context collaborators
 * for their records, then hands them to the consolidation engine.
 *
 * Hexagonal: depends on producers for data and on consolidateDay() for planning.
 */

import type { CollaboratorProducers, ProducerSource } from '../connectors/interfaces';
import type { DailyPlan, PlanDocument } from '../core-domain/daily-plan';
import type { PlannerConfig } from '../core-domain/planner-config';
import { silentLogger, type Logger } from '../logging/logger';
import { consolidateDay, resolvePlannerConfig } from '../planner/consolidate-day';
import { PlanValidationError } from '../planner/errors';
import type { RecordRejection } from '../planner/item-normalizer';
import type { CalendarConflict, FreeSlot } from '../planner/schedule-analysis';
import { toPlanDocument } from '../planner/plan-document';
import { isCalendarDate } from '../planner/time-of-day';

// --- Result Types ---

export interface ProducerFailure {
  source: ProducerSource;
  producerId: string;
  message: string;
}

export interface PlannerRunResult {
  plan: DailyPlan;
  document: PlanDocument;
  rejected: RecordRejection[];
  conflicts: CalendarConflict[];
  freeSlots: FreeSlot[];
  // Collaborators that failed; their source contributed no records
  producerFailures: ProducerFailure[];
}

interface CollectedRecords {
  records: unknown[];
  failure?: ProducerFailure;
}

// --- Constructor Options ---

export interface DailyPlannerServiceOptions {
  producers: CollaboratorProducers;
  config?: Partial<PlannerConfig>;
  logger?: Logger;
}

// --- Service ---

export class DailyPlannerService {
  private readonly producers: CollaboratorProducers;
  private readonly config: PlannerConfig;
  private readonly logger: Logger;

  constructor(options: DailyPlannerServiceOptions) {
    this.producers = options.producers;
    this.config = resolvePlannerConfig(options.config);
    this.logger = options.logger ?? silentLogger;
  }

  async run(date: string): Promise<PlannerRunResult> {
    const startTime = Date.now();
    if (!isCalendarDate(date)) {
      throw new PlanValidationError([`date ${JSON.stringify(date)} is not a well-formed calendar date`]);
    }
    this.logger.info('Planner', `Starting planning run for ${date}`);

    const [calendar, email, context] = await Promise.all([
      this.collect('calendar', date),
      this.collect('email', date),
      this.collect('context', date),
    ]);
    const producerFailures = [calendar, email, context].flatMap(({ failure }) =>
      failure ? [failure] : []
    );

    try {
      const { plan, rejected, conflicts, freeSlots } = consolidateDay(
        { date, calendar: calendar.records, email: email.records, context: context.records },
        { config: this.config, logger: this.logger }
      );

      this.logger.info(
        'Planner',
        `Planning run complete in ${Date.now() - startTime}ms: ${plan.plan.length} item(s), ${rejected.length} rejected`
      );
      return {
        plan,
        document: toPlanDocument(plan),
        rejected,
        conflicts,
        freeSlots,
        producerFailures,
      };
    } catch (error) {
      if (error instanceof PlanValidationError) {
        this.logger.error('Planner', 'Plan failed validation', { violations: error.violations });
      }
      throw error;
    }
  }

  // --- Private ---

  private async collect(source: ProducerSource, date: string): Promise<CollectedRecords> {
    const producer = this.producers[source];
    this.logger.info('Planner', `Invoking ${producer.name}`);

    try {
      const records = await producer.produce({ date });
      this.logger.info('Planner', `${producer.name} returned ${records.length} record(s)`);
      return { records };
    } catch (error) {
      const message = error instanceof Error ? error.message : 'Unknown error';
      this.logger.error('Planner', `${producer.name} failed: ${message}`);
      return { records: [], failure: { source, producerId: producer.id, message } };
    }
  }
}
