/**
 * Schedule Analysis
 *
 * Reads the events of a validated plan for overlapping commitments and for the
 * free working time left between them. The plan itself is never changed.
 */

import type { DailyPlan } from '../core-domain/daily-plan';
import type { EventPlanItem, PlanItem } from '../core-domain/plan-item';
import {
  instantToEpochMs,
  SECONDS_PER_DAY,
  secondsOfDay,
  timeOfDayFromSeconds,
  toWallClock,
} from './time-of-day';

export const WORKDAY_START = '09:00:00';
export const WORKDAY_END = '17:00:00';
export const MIN_FREE_SLOT_MINUTES = 15;

export interface CalendarConflict {
  events: readonly [EventPlanItem, EventPlanItem];
  details: string;
}

export interface FreeSlot {
  // HH:MM:SS on the plan date
  start: string;
  end: string;
  durationMinutes: number;
}

export interface ScheduleAnalysis {
  conflicts: CalendarConflict[];
  freeSlots: FreeSlot[];
}

interface Span {
  start: number;
  end: number;
}

function isEvent(item: PlanItem): item is EventPlanItem {
  return item.itemType === 'event';
}

function clockLabel(instant: string): string {
  return toWallClock(instant)?.time.slice(0, 5) ?? instant;
}

function describeEvent(event: EventPlanItem): string {
  const { summary, start, end } = event.details;
  return `'${summary}' (${clockLabel(start)}-${clockLabel(end)})`;
}

/**
 * Every pair of events whose time ranges overlap. Events that only touch
 * (one ends as the next starts) do not conflict.
 */
export function findConflicts(events: readonly EventPlanItem[]): CalendarConflict[] {
  const conflicts: CalendarConflict[] = [];
  events.forEach((first, index) => {
    for (const second of events.slice(index + 1)) {
      const overlapStart = Math.max(
        instantToEpochMs(first.details.start),
        instantToEpochMs(second.details.start)
      );
      const overlapEnd = Math.min(
        instantToEpochMs(first.details.end),
        instantToEpochMs(second.details.end)
      );
      if (overlapStart < overlapEnd) {
        conflicts.push({
          events: [first, second],
          details: `Overlap between ${describeEvent(first)} and ${describeEvent(second)}`,
        });
      }
    }
  });
  return conflicts;
}

// Seconds of the plan date covered by an event, in the offset its start was written in
function spanOnDate(event: EventPlanItem, date: string): Span | null {
  const start = toWallClock(event.details.start);
  const end = toWallClock(event.details.end);
  if (!start || !end || start.date !== date) return null;

  const startSeconds = secondsOfDay(start.time);
  let endSeconds = startSeconds;
  if (end.date === date) endSeconds = secondsOfDay(end.time);
  else if (end.date > date) endSeconds = SECONDS_PER_DAY;
  return { start: startSeconds, end: Math.max(startSeconds, endSeconds) };
}

export function findFreeSlots(events: readonly EventPlanItem[], date: string): FreeSlot[] {
  const dayStart = secondsOfDay(WORKDAY_START);
  const dayEnd = secondsOfDay(WORKDAY_END);
  const minimum = MIN_FREE_SLOT_MINUTES * 60;

  const spans = events
    .flatMap((event) => {
      const span = spanOnDate(event, date);
      return span ? [span] : [];
    })
    .sort((a, b) => a.start - b.start);

  const slots: FreeSlot[] = [];
  let cursor = dayStart;
  const addSlot = (end: number): void => {
    if (end - cursor < minimum) return;
    slots.push({
      start: timeOfDayFromSeconds(cursor),
      end: timeOfDayFromSeconds(end),
      durationMinutes: Math.floor((end - cursor) / 60),
    });
  };

  for (const span of spans) {
    const start = Math.max(span.start, dayStart);
    const end = Math.min(span.end, dayEnd);
    if (start >= end) continue;
    if (start > cursor) addSlot(start);
    cursor = Math.max(cursor, end);
  }
  if (dayEnd > cursor) addSlot(dayEnd);

  return slots;
}

export function analyzeSchedule(plan: DailyPlan): ScheduleAnalysis {
  const events = plan.plan.filter(isEvent);
  return {
    conflicts: findConflicts(events),
    freeSlots: findFreeSlots(events, plan.date),
  };
}
