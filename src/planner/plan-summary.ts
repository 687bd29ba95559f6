import type { PlanItemCounts } from '../core-domain/daily-plan';
import type { PlanItem } from '../core-domain/plan-item';

export function countPlanItems(plan: readonly PlanItem[]): PlanItemCounts {
  const counts: PlanItemCounts = { event: 0, recommendation: 0, task: 0 };
  for (const item of plan) {
    counts[item.itemType] += 1;
  }
  return counts;
}

/**
 * One-line, user-visible description of a plan. Always recomputed from `plan`.
 */
export function summarizePlan(date: string, plan: readonly PlanItem[]): string {
  const counts = countPlanItems(plan);
  return (
    `Plan for ${date}. ` +
    `Events: ${counts.event}. ` +
    `Tasks: ${counts.task}. ` +
    `Recommendations: ${counts.recommendation}.`
  );
}
