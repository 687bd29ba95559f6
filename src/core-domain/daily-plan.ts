/**
 * Daily Plan Domain Model
 *
 * The consolidated plan for one calendar date, plus the document shape it is
 * serialized to at the CLI boundary.
 */

import { z } from 'zod';
import type { PlanItem, PlanItemType, RecommendationPayload, TaskPriority } from './plan-item';

export const PlanDateSchema = z
  .string()
  .regex(/^\d{4}-\d{2}-\d{2}$/, 'date must be formatted as YYYY-MM-DD');

/**
 * Loose envelope used before item-level checks run
 */
export const DailyPlanEnvelopeSchema = z.object(
  {
    date: z.string({ error: 'date must be a string' }),
    plan: z.array(z.unknown(), { error: 'plan must be an array' }),
    summary: z.string({ error: 'summary must be a string' }),
  },
  { error: 'daily plan must be an object' }
);

export interface DailyPlan {
  readonly date: string;
  readonly plan: readonly PlanItem[];
  // Derived from `plan`; only the summary generator produces it
  readonly summary: string;
}

// ==================== DOCUMENT (OUTPUT CONTRACT) ====================

export interface EventDocumentDetails {
  start_time: string;
  end_time: string;
  summary: string;
  location: string | null;
}

export interface TaskDocumentDetails {
  description: string;
  priority: TaskPriority;
  due_date: string | null;
  source_email_id: string;
}

export interface RecommendationDocumentDetails {
  kind: string;
  details: RecommendationPayload;
  impact_label: string;
  impact_time: string;
}

export type PlanDocumentItem =
  | { time: string; item_type: 'event'; details: EventDocumentDetails; priority: null }
  | { time: string; item_type: 'task'; details: TaskDocumentDetails; priority: TaskPriority }
  | {
      time: string;
      item_type: 'recommendation';
      details: RecommendationDocumentDetails;
      priority: null;
    };

export interface PlanDocument {
  date: string;
  plan: PlanDocumentItem[];
  summary: string;
}

export type PlanItemCounts = Record<PlanItemType, number>;
