/**
 * Plan Assembler
 *
 * Orders normalized items into the plan sequence:
 * 1. placement time, ascending
 * 2. on equal times, events, then recommendations, then tasks (fixed
 *    commitments first, synthetic task times last)
 * 3. otherwise input order (calendar, email, context), via a stable sort
 */

import type { DailyPlan } from '../core-domain/daily-plan';
import type { PlanItem, PlanItemType } from '../core-domain/plan-item';
import { summarizePlan } from './plan-summary';
import { compareTimeOfDay } from './time-of-day';

const VARIANT_PRECEDENCE: Record<PlanItemType, number> = {
  event: 0,
  recommendation: 1,
  task: 2,
};

export function comparePlanItems(a: PlanItem, b: PlanItem): number {
  return (
    compareTimeOfDay(a.placementTime, b.placementTime) ||
    VARIANT_PRECEDENCE[a.itemType] - VARIANT_PRECEDENCE[b.itemType]
  );
}

/**
 * Returns a sorted copy; the input array is left untouched.
 */
export function assemblePlan(items: readonly PlanItem[]): PlanItem[] {
  return [...items].sort(comparePlanItems);
}

export function assembleDailyPlan(date: string, items: readonly PlanItem[]): DailyPlan {
  const plan = assemblePlan(items);
  return { date, plan, summary: summarizePlan(date, plan) };
}
