/**
 * Plan Request Handler
 *
 * JSON-in, JSON-out entry point for agent runtimes and web hooks. The body
 * carries the collaborator records inline:
 *
 *   { "date": "2025-01-15", "calendar": [...], "email": [...], "context": [...] }
 *
 * `date` defaults to today. The response is the plan document, or
 * `{ "error": ... }` when the request cannot be planned.
 */

import { format } from 'date-fns';
import type { PlannerConfig } from '../core-domain/planner-config';
import { silentLogger, type Logger } from '../logging/logger';
import { consolidateDay } from '../planner/consolidate-day';
import { PlanConsolidationError, PlanValidationError } from '../planner/errors';
import { ConsolidationInputSchema } from '../planner/input';
import { stringifyPlanDocument } from '../planner/plan-document';

const PlanRequestSchema = ConsolidationInputSchema.partial({ date: true });

export interface PlanRequestOptions {
  config?: Partial<PlannerConfig>;
  logger?: Logger;
  now?: () => Date;
}

function errorResponse(error: string, extra: Record<string, unknown> = {}): string {
  return JSON.stringify({ error, ...extra });
}

export function handlePlanRequest(body: string, options: PlanRequestOptions = {}): string {
  const logger = options.logger ?? silentLogger;
  const now = options.now ?? (() => new Date());

  let payload: unknown;
  try {
    payload = JSON.parse(body);
  } catch {
    logger.error('PlanRequest', 'Invalid JSON input');
    return errorResponse('Invalid JSON input.');
  }

  const request = PlanRequestSchema.safeParse(payload);
  if (!request.success) {
    const issues = request.error.issues.map(
      (issue) => `${issue.path.map(String).join('.') || 'body'}: ${issue.message}`
    );
    logger.error('PlanRequest', 'Invalid request', { issues });
    return errorResponse('Invalid request.', { issues });
  }

  const { date = format(now(), 'yyyy-MM-dd'), calendar, email, context } = request.data;
  logger.debug('PlanRequest', `Planning ${date}`);

  try {
    const { plan } = consolidateDay(
      { date, calendar, email, context },
      { config: options.config, logger }
    );
    return stringifyPlanDocument(plan);
  } catch (error) {
    if (error instanceof PlanValidationError) {
      return errorResponse('Plan validation failed.', { violations: error.violations });
    }
    if (error instanceof PlanConsolidationError) {
      return errorResponse(error.message);
    }
    throw error;
  }
}
