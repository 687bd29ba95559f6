import type { DailyPlan } from '../core-domain/daily-plan';
import { stringifyPlanDocument, toPlanDocument } from './plan-document';

const plan: DailyPlan = {
  date: '2025-01-15',
  plan: [
    {
      itemType: 'recommendation',
      placementTime: '07:00:00',
      details: {
        kind: 'weather',
        details: { description: 'Snow' },
        impactLabel: 'morning',
        impactTime: '2025-01-15T07:00:00Z',
      },
      priority: null,
    },
    {
      itemType: 'task',
      placementTime: '09:00:00',
      details: {
        description: 'Renew parking permit',
        priority: 'high',
        dueDate: '2025-01-17',
        sourceEmailId: 'msg-42',
      },
      priority: 'high',
    },
    {
      itemType: 'event',
      placementTime: '10:00:00',
      details: {
        start: '2025-01-15T10:00:00-05:00',
        end: '2025-01-15T11:00:00-05:00',
        summary: 'Planning',
        location: null,
      },
      priority: null,
    },
  ],
  summary: 'Plan for 2025-01-15. Events: 1. Tasks: 1. Recommendations: 1.',
};

describe('plan document', () => {
  it('maps every item to the snake_case document shape', () => {
    expect(toPlanDocument(plan)).toEqual({
      date: '2025-01-15',
      plan: [
        {
          time: '07:00:00',
          item_type: 'recommendation',
          details: {
            kind: 'weather',
            details: { description: 'Snow' },
            impact_label: 'morning',
            impact_time: '2025-01-15T07:00:00Z',
          },
          priority: null,
        },
        {
          time: '09:00:00',
          item_type: 'task',
          details: {
            description: 'Renew parking permit',
            priority: 'high',
            due_date: '2025-01-17',
            source_email_id: 'msg-42',
          },
          priority: 'high',
        },
        {
          time: '10:00:00',
          item_type: 'event',
          details: {
            start_time: '2025-01-15T10:00:00-05:00',
            end_time: '2025-01-15T11:00:00-05:00',
            summary: 'Planning',
            location: null,
          },
          priority: null,
        },
      ],
      summary: 'Plan for 2025-01-15. Events: 1. Tasks: 1. Recommendations: 1.',
    });
  });

  it('writes the document as indented JSON', () => {
    const json = stringifyPlanDocument({ date: '2025-01-15', plan: [], summary: 'empty' });
    expect(json).toBe('{\n  "date": "2025-01-15",\n  "plan": [],\n  "summary": "empty"\n}');
  });
});
