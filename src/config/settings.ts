/**
 * Settings
 *
 * Reads runtime settings from an environment map (defaults to `process.env`).
 * Unset or blank variables fall back to the schema defaults.
 */

import { z } from 'zod';
import { ConfigurationError } from '../planner/errors';
import { LOG_LEVELS } from '../logging/logger';
import type { PlannerConfig } from '../core-domain/planner-config';

export const SettingsSchema = z.object({
  logLevel: z.string().toLowerCase().pipe(z.enum(LOG_LEVELS)).default('info'),
  commuteHour: z.coerce.number().int().min(0).max(23).default(8),
  commuteLeadMinutes: z.coerce.number().int().min(0).max(180).default(15),
  utcOffset: z
    .string()
    .regex(/^(Z|[+-]([0-1][0-9]|2[0-3]):[0-5][0-9])$/, 'must be Z or ±HH:MM')
    .default('Z'),
  calendarFilePath: z.string().default('mock_data/calendar_events.json'),
  emailFilePath: z.string().default('mock_data/email_tasks.json'),
  contextFilePath: z.string().default('mock_data/context_recommendations.json'),
});

export type Settings = z.infer<typeof SettingsSchema>;

const ENV_VARIABLES: Record<keyof Settings, string> = {
  logLevel: 'LOG_LEVEL',
  commuteHour: 'COMMUTE_HOUR',
  commuteLeadMinutes: 'COMMUTE_LEAD_MINUTES',
  utcOffset: 'PLAN_UTC_OFFSET',
  calendarFilePath: 'MOCK_CALENDAR_FILE_PATH',
  emailFilePath: 'MOCK_EMAIL_FILE_PATH',
  contextFilePath: 'MOCK_CONTEXT_FILE_PATH',
};

function readVariable(env: NodeJS.ProcessEnv, name: string): string | undefined {
  const value = env[name]?.trim();
  return value ? value : undefined;
}

function envVariableFor(key: PropertyKey | undefined): string {
  const match = Object.entries(ENV_VARIABLES).find(([field]) => field === key);
  return match ? match[1] : String(key);
}

export function loadSettings(env: NodeJS.ProcessEnv = process.env): Settings {
  const raw = Object.fromEntries(
    Object.entries(ENV_VARIABLES).map(([key, name]) => [key, readVariable(env, name)])
  );

  const parsed = SettingsSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigurationError(
      parsed.error.issues.map((issue) => `${envVariableFor(issue.path[0])}: ${issue.message}`)
    );
  }
  return parsed.data;
}

export function toPlannerConfig(settings: Settings): PlannerConfig {
  return {
    commuteHour: settings.commuteHour,
    commuteLeadMinutes: settings.commuteLeadMinutes,
    utcOffset: settings.utcOffset,
  };
}
