/**
 * Planner Configuration
 *
 * Explicit configuration handed to the item normalizer. Nothing in the engine
 * reads ambient state; callers derive this from settings or build it inline.
 */

import { z } from 'zod';

export const PlannerConfigSchema = z.object({
  // Hour of day (0-23) the user usually leaves for work
  commuteHour: z.number().int().min(0).max(23).default(8),
  // Commute recommendations are placed this many minutes before the commute hour
  commuteLeadMinutes: z.number().int().min(0).max(180).default(15),
  // Offset written on recommendation impact times, `Z` or ±HH:MM
  utcOffset: z
    .string()
    .regex(/^(Z|[+-]([0-1][0-9]|2[0-3]):[0-5][0-9])$/, 'utcOffset must be Z or ±HH:MM')
    .default('Z'),
});

export type PlannerConfig = z.infer<typeof PlannerConfigSchema>;

export function createDefaultPlannerConfig(): PlannerConfig {
  return PlannerConfigSchema.parse({});
}
