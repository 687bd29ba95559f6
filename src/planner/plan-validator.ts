/**
 * Plan Validator
 *
 * Last structural check before a plan may be emitted. Collects every violated
 * invariant and throws them together as one `PlanValidationError`; a plan that
 * passes comes back deep-frozen.
 */

import { DailyPlanEnvelopeSchema, type DailyPlan } from '../core-domain/daily-plan';
import { PlanItemSchema, type PlanItem } from '../core-domain/plan-item';
import { PlanValidationError } from './errors';
import { comparePlanItems } from './plan-assembler';
import { summarizePlan } from './plan-summary';
import { isCalendarDate, toWallClock } from './time-of-day';

function formatPath(path: readonly PropertyKey[]): string {
  return path
    .map((segment) => (typeof segment === 'number' ? `[${segment}]` : `.${String(segment)}`))
    .join('');
}

function describeItem(item: PlanItem): string {
  return `${item.itemType} at ${item.placementTime}`;
}

function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const nested of Object.values(value)) {
      deepFreeze(nested);
    }
  }
  return value;
}

function checkEventDate(item: PlanItem, index: number, date: string): string | null {
  if (item.itemType !== 'event') return null;
  const start = toWallClock(item.details.start);
  if (!start) return `plan[${index}].details.start: not an ISO-8601 date-time`;
  if (start.date !== date) {
    return `plan[${index}]: event starts on ${start.date}, outside plan date ${date}`;
  }
  return null;
}

function checkTaskPriority(item: PlanItem, index: number): string | null {
  if (item.itemType !== 'task' || item.priority === item.details.priority) return null;
  return `plan[${index}].priority: ${JSON.stringify(item.priority)} does not match details.priority ${JSON.stringify(item.details.priority)}`;
}

interface ParsedItem {
  index: number;
  item: PlanItem;
}

// Adjacent pairs among the items that parsed, reported by their plan index
function checkOrdering(parsed: readonly ParsedItem[]): string[] {
  const violations: string[] = [];
  for (let position = 1; position < parsed.length; position++) {
    const previous = parsed[position - 1];
    const current = parsed[position];
    if (previous && current && comparePlanItems(previous.item, current.item) > 0) {
      violations.push(
        `plan[${previous.index}] (${describeItem(previous.item)}) is ordered before plan[${current.index}] (${describeItem(current.item)})`
      );
    }
  }
  return violations;
}

export function validatePlan(candidate: unknown): DailyPlan {
  const envelope = DailyPlanEnvelopeSchema.safeParse(candidate);
  if (!envelope.success) {
    throw new PlanValidationError(
      envelope.error.issues.map((issue) => {
        const field = formatPath(issue.path).replace(/^\./, '');
        return field ? `${field}: ${issue.message}` : issue.message;
      })
    );
  }

  const { date, plan: rawItems, summary } = envelope.data;
  const violations: string[] = [];

  const dateIsValid = isCalendarDate(date);
  if (!dateIsValid) {
    violations.push(`date ${JSON.stringify(date)} is not a well-formed calendar date`);
  }

  const parsedItems: ParsedItem[] = [];
  rawItems.forEach((raw, index) => {
    const parsed = PlanItemSchema.safeParse(raw);
    if (!parsed.success) {
      for (const issue of parsed.error.issues) {
        violations.push(`plan[${index}]${formatPath(issue.path)}: ${issue.message}`);
      }
      return;
    }

    let item: PlanItem;
    try {
      // zod copies the top level only; nested payloads still belong to the caller
      item = structuredClone(parsed.data);
    } catch {
      violations.push(`plan[${index}].details: not plain data`);
      return;
    }
    parsedItems.push({ index, item });

    const priorityViolation = checkTaskPriority(item, index);
    if (priorityViolation) violations.push(priorityViolation);
    const dateViolation = dateIsValid ? checkEventDate(item, index, date) : null;
    if (dateViolation) violations.push(dateViolation);
  });

  violations.push(...checkOrdering(parsedItems));

  const items = parsedItems.map(({ item }) => item);
  // Counts are only meaningful once every item is well-formed
  if (items.length === rawItems.length) {
    const expectedSummary = summarizePlan(date, items);
    if (summary !== expectedSummary) {
      violations.push(
        `summary ${JSON.stringify(summary)} does not match plan contents, expected ${JSON.stringify(expectedSummary)}`
      );
    }
  }

  if (violations.length > 0) {
    throw new PlanValidationError(violations);
  }

  return deepFreeze({ date, plan: items, summary });
}
