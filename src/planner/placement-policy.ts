/**
 * Placement Policy
 *
 * Deterministic anchor times for items that carry no time of their own. This is
 * a fixed heuristic, not a scheduler: fitting tasks into free calendar slots is
 * not attempted here.
 */

import type { PlannerConfig } from '../core-domain/planner-config';
import type { TaskPriority } from '../core-domain/plan-item';
import { formatTimeOfDay, shiftTimeOfDay } from './time-of-day';

/** Urgent and high priority tasks open the working day. */
export const EARLY_WORK_BLOCK_TIME = '09:00:00';

/** Normal and low priority tasks wait for the afternoon catch-up block. */
export const CATCH_UP_TIME = '14:00:00';

export const MORNING_TIME = '07:00:00';

/** Used for impact labels the policy does not know. */
export const NEUTRAL_TIME = '07:00:00';

const COMMUTE_LABELS = new Set(['commute', 'traffic']);

const FIXED_LABEL_TIMES = new Map<string, string>([['morning', MORNING_TIME]]);

export function placeTask(priority: TaskPriority): string {
  return priority === 'urgent' || priority === 'high' ? EARLY_WORK_BLOCK_TIME : CATCH_UP_TIME;
}

export function commuteTime(config: PlannerConfig): string {
  return shiftTimeOfDay(formatTimeOfDay(config.commuteHour, 0), -config.commuteLeadMinutes);
}

export function placeRecommendation(impactLabel: string, config: PlannerConfig): string {
  const label = impactLabel.trim().toLowerCase();
  if (COMMUTE_LABELS.has(label)) return commuteTime(config);
  return FIXED_LABEL_TIMES.get(label) ?? NEUTRAL_TIME;
}
