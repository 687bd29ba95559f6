import type { DailyPlan, PlanDocument, PlanDocumentItem } from '../core-domain/daily-plan';
import type { PlanItem } from '../core-domain/plan-item';

function toDocumentItem(item: PlanItem): PlanDocumentItem {
  switch (item.itemType) {
    case 'event':
      return {
        time: item.placementTime,
        item_type: 'event',
        details: {
          start_time: item.details.start,
          end_time: item.details.end,
          summary: item.details.summary,
          location: item.details.location,
        },
        priority: null,
      };
    case 'task':
      return {
        time: item.placementTime,
        item_type: 'task',
        details: {
          description: item.details.description,
          priority: item.details.priority,
          due_date: item.details.dueDate,
          source_email_id: item.details.sourceEmailId,
        },
        priority: item.priority,
      };
    case 'recommendation':
      return {
        time: item.placementTime,
        item_type: 'recommendation',
        details: {
          kind: item.details.kind,
          details: item.details.details,
          impact_label: item.details.impactLabel,
          impact_time: item.details.impactTime,
        },
        priority: null,
      };
  }
}

/**
 * Serializes a validated plan to the document exposed at the CLI boundary.
 */
export function toPlanDocument(plan: DailyPlan): PlanDocument {
  return {
    date: plan.date,
    plan: plan.plan.map(toDocumentItem),
    summary: plan.summary,
  };
}

export function stringifyPlanDocument(plan: DailyPlan): string {
  return JSON.stringify(toPlanDocument(plan), null, 2);
}
