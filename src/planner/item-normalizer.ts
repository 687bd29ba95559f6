/**
 * Item Normalizer
 *
 * Turns raw collaborator records into plan items with a placement time. Each
 * record is handled on its own: a malformed one becomes a `RecordRejection`
 * and the rest of the batch carries on.
 */

import type { ZodError } from 'zod';
import type { PlanItem } from '../core-domain/plan-item';
import type { PlannerConfig } from '../core-domain/planner-config';
import { CalendarRecordSchema, ContextRecordSchema, EmailTaskRecordSchema } from './input';
import { placeRecommendation, placeTask } from './placement-policy';
import { instantToEpochMs, toWallClock } from './time-of-day';

export type RecordSource = 'calendar' | 'email' | 'context';

export interface RecordRejection {
  source: RecordSource;
  // Position of the record in its source collection
  index: number;
  reason: string;
  record: unknown;
}

export interface CollaboratorRecords {
  calendar: readonly unknown[];
  email: readonly unknown[];
  context: readonly unknown[];
}

export interface NormalizationResult {
  items: PlanItem[];
  rejected: RecordRejection[];
}

export type NormalizeOutcome = { ok: true; item: PlanItem } | { ok: false; reason: string };

function accept(item: PlanItem): NormalizeOutcome {
  return { ok: true, item };
}

function reject(reason: string): NormalizeOutcome {
  return { ok: false, reason };
}

function describeIssues(error: ZodError): string {
  return [...new Set(error.issues.map((issue) => issue.message))].join('; ');
}

export function normalizeCalendarRecord(raw: unknown, date: string): NormalizeOutcome {
  const parsed = CalendarRecordSchema.safeParse(raw);
  if (!parsed.success) return reject(describeIssues(parsed.error));

  const { start, end, summary, location } = parsed.data;
  const startClock = toWallClock(start);
  if (!startClock) return reject('start time is not an ISO-8601 date-time');
  if (instantToEpochMs(end) < instantToEpochMs(start)) {
    return reject('end time precedes start time');
  }
  if (startClock.date !== date) {
    return reject(`start time falls on ${startClock.date}, outside plan date ${date}`);
  }

  return accept({
    itemType: 'event',
    placementTime: startClock.time,
    details: { start, end, summary, location: location ?? null },
    priority: null,
  });
}

export function normalizeEmailTaskRecord(raw: unknown): NormalizeOutcome {
  const parsed = EmailTaskRecordSchema.safeParse(raw);
  if (!parsed.success) return reject(describeIssues(parsed.error));

  const { description, priority, due_date, source_email_id } = parsed.data;
  return accept({
    itemType: 'task',
    placementTime: placeTask(priority),
    details: {
      description,
      priority,
      dueDate: due_date ?? null,
      sourceEmailId: source_email_id,
    },
    priority,
  });
}

export function normalizeContextRecord(
  raw: unknown,
  date: string,
  config: PlannerConfig
): NormalizeOutcome {
  const parsed = ContextRecordSchema.safeParse(raw);
  if (!parsed.success) return reject(describeIssues(parsed.error));

  const { kind, detail_payload, impact_label } = parsed.data;
  let details: typeof detail_payload;
  try {
    // The plan is frozen after validation; never freeze the caller's payload
    details = structuredClone(detail_payload);
  } catch {
    return reject('detail payload is not plain data');
  }

  const placementTime = placeRecommendation(impact_label, config);
  return accept({
    itemType: 'recommendation',
    placementTime,
    details: {
      kind,
      details,
      impactLabel: impact_label,
      impactTime: `${date}T${placementTime}${config.utcOffset}`,
    },
    priority: null,
  });
}

/**
 * Normalizes every record, preserving source order: calendar, email, context.
 */
export function normalizeRecords(
  records: CollaboratorRecords,
  date: string,
  config: PlannerConfig
): NormalizationResult {
  const items: PlanItem[] = [];
  const rejected: RecordRejection[] = [];

  const sources: Array<[RecordSource, readonly unknown[], (raw: unknown) => NormalizeOutcome]> = [
    ['calendar', records.calendar, (raw) => normalizeCalendarRecord(raw, date)],
    ['email', records.email, (raw) => normalizeEmailTaskRecord(raw)],
    ['context', records.context, (raw) => normalizeContextRecord(raw, date, config)],
  ];

  for (const [source, batch, normalize] of sources) {
    batch.forEach((record, index) => {
      const outcome = normalize(record);
      if (outcome.ok) {
        items.push(outcome.item);
      } else {
        rejected.push({ source, index, reason: outcome.reason, record });
      }
    });
  }

  return { items, rejected };
}
