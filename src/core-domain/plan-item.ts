/**
 * Plan Item Domain Model
 *
 * A single entry of a consolidated daily plan. Items are a discriminated union
 * over `itemType`; each variant carries its own payload shape:
 * - event: a fixed calendar commitment
 * - task: work extracted from email, placed at a synthetic time
 * - recommendation: weather/traffic context relevant at some point of the day
 */

import { z } from 'zod';

export const PLAN_ITEM_TYPES = ['event', 'recommendation', 'task'] as const;

export const PlanItemTypeSchema = z.enum(PLAN_ITEM_TYPES);

export type PlanItemType = z.infer<typeof PlanItemTypeSchema>;

/**
 * Task priority, most pressing first
 */
export const TASK_PRIORITIES = ['urgent', 'high', 'normal', 'low'] as const;

export const TaskPrioritySchema = z.enum(TASK_PRIORITIES, {
  error: 'priority must be one of urgent, high, normal, low for task items',
});

export type TaskPriority = z.infer<typeof TaskPrioritySchema>;

export const RECOMMENDATION_KINDS = ['weather', 'traffic'] as const;

export const RecommendationKindSchema = z.enum(RECOMMENDATION_KINDS);

export type RecommendationKind = z.infer<typeof RecommendationKindSchema>;

// HH:MM:SS, 24h
export const TimeOfDaySchema = z
  .string()
  .regex(/^([0-1][0-9]|2[0-3]):[0-5][0-9]:[0-5][0-9]$/, 'time must be formatted as HH:MM:SS');

/**
 * Opaque structured payload supplied by the context collaborator
 */
export const RecommendationPayloadSchema = z.union([
  z.record(z.string(), z.unknown()),
  z.string(),
]);

export type RecommendationPayload = z.infer<typeof RecommendationPayloadSchema>;

// ==================== VARIANT PAYLOADS ====================

export const EventDetailsSchema = z.strictObject({
  start: z.string(),
  end: z.string(),
  summary: z.string().min(1),
  location: z.string().nullable(),
});

export type EventDetails = z.infer<typeof EventDetailsSchema>;

export const TaskDetailsSchema = z.strictObject({
  description: z.string().min(1),
  priority: TaskPrioritySchema,
  dueDate: z.string().nullable(),
  sourceEmailId: z.string().min(1),
});

export type TaskDetails = z.infer<typeof TaskDetailsSchema>;

export const RecommendationDetailsSchema = z.strictObject({
  kind: RecommendationKindSchema,
  details: RecommendationPayloadSchema,
  impactLabel: z.string(),
  impactTime: z.string(),
});

export type RecommendationDetails = z.infer<typeof RecommendationDetailsSchema>;

// ==================== PLAN ITEM ====================

const NullPrioritySchema = z.null({
  error: 'priority must be null unless item_type is task',
});

export const EventPlanItemSchema = z.object({
  itemType: z.literal('event'),
  placementTime: TimeOfDaySchema,
  details: EventDetailsSchema,
  priority: NullPrioritySchema,
});

export const TaskPlanItemSchema = z.object({
  itemType: z.literal('task'),
  placementTime: TimeOfDaySchema,
  details: TaskDetailsSchema,
  priority: TaskPrioritySchema,
});

export const RecommendationPlanItemSchema = z.object({
  itemType: z.literal('recommendation'),
  placementTime: TimeOfDaySchema,
  details: RecommendationDetailsSchema,
  priority: NullPrioritySchema,
});

export const PlanItemSchema = z.discriminatedUnion(
  'itemType',
  [EventPlanItemSchema, TaskPlanItemSchema, RecommendationPlanItemSchema],
  { error: 'item_type must be one of event, task, recommendation' }
);

export type EventPlanItem = z.infer<typeof EventPlanItemSchema>;
export type TaskPlanItem = z.infer<typeof TaskPlanItemSchema>;
export type RecommendationPlanItem = z.infer<typeof RecommendationPlanItemSchema>;
export type PlanItem = z.infer<typeof PlanItemSchema>;
