/**
 * Collaborator Input Contract
 *
 * Shapes of the raw records the calendar, email and context collaborators
 * hand to the planner. Records arrive as untrusted JSON; each one is parsed on
 * its own so a malformed record can be rejected without failing the batch.
 */

import { z } from 'zod';
import { RECOMMENDATION_KINDS, TASK_PRIORITIES, type TaskPriority } from '../core-domain/plan-item';
import { PlanDateSchema } from '../core-domain/daily-plan';
import { isCalendarDate, isIsoInstant } from './time-of-day';

function isAbsent(input: unknown): boolean {
  return input === undefined || input === null;
}

function requiredString(field: string) {
  return z.string({
    error: (issue) => (isAbsent(issue.input) ? `missing ${field}` : `${field} must be a string`),
  });
}

// ==================== CALENDAR ====================

export const CalendarRecordSchema = z.object(
  {
    start: requiredString('start time').refine(isIsoInstant, 'start time is not an ISO-8601 date-time'),
    end: requiredString('end time').refine(isIsoInstant, 'end time is not an ISO-8601 date-time'),
    summary: requiredString('summary').trim().min(1, 'missing summary'),
    location: z.string({ error: 'location must be a string' }).nullish(),
  },
  { error: 'record is not an object' }
);

export type CalendarRecord = z.input<typeof CalendarRecordSchema>;

// ==================== EMAIL ====================

// `medium` is what older email extractors emit for `normal`
const LEGACY_PRIORITIES = [...TASK_PRIORITIES, 'medium'] as const;

const RawPrioritySchema = requiredString('priority')
  .trim()
  .toLowerCase()
  .pipe(
    z.enum(LEGACY_PRIORITIES, {
      error: (issue) => `unknown priority ${JSON.stringify(issue.input)}`,
    })
  )
  .transform((priority): TaskPriority => (priority === 'medium' ? 'normal' : priority));

export const EmailTaskRecordSchema = z.object(
  {
    description: requiredString('description').trim().min(1, 'missing description'),
    priority: RawPrioritySchema,
    due_date: z
      .string({ error: 'due date must be a string' })
      .refine(isCalendarDate, 'due date is not a valid YYYY-MM-DD date')
      .nullish(),
    source_email_id: requiredString('source email id').trim().min(1, 'missing source email id'),
  },
  { error: 'record is not an object' }
);

export type EmailTaskRecord = z.input<typeof EmailTaskRecordSchema>;

// ==================== CONTEXT ====================

export const ContextRecordSchema = z.object(
  {
    kind: requiredString('recommendation kind')
      .trim()
      .toLowerCase()
      .pipe(
        z.enum(RECOMMENDATION_KINDS, {
          error: (issue) => `unknown recommendation kind ${JSON.stringify(issue.input)}`,
        })
      ),
    detail_payload: z.union([z.record(z.string(), z.unknown()), z.string()], {
      error: (issue) =>
        isAbsent(issue.input) ? 'missing detail payload' : 'detail payload must be an object or a string',
    }),
    impact_label: requiredString('impact label').trim().min(1, 'missing impact label'),
  },
  { error: 'record is not an object' }
);

export type ContextRecord = z.input<typeof ContextRecordSchema>;

// ==================== CONSOLIDATION INPUT ====================

export const ConsolidationInputSchema = z.object({
  date: PlanDateSchema,
  calendar: z.array(z.unknown()).default([]),
  email: z.array(z.unknown()).default([]),
  context: z.array(z.unknown()).default([]),
});

export interface ConsolidationInput {
  date: string;
  calendar?: readonly unknown[];
  email?: readonly unknown[];
  context?: readonly unknown[];
}
