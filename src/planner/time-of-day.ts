// Wall-clock helpers. Instants keep the offset they were written in: the
// time-of-day of "2025-01-15T10:00:00+01:00" is 10:00:00 regardless of the
// machine time zone.

import { isValid, parseISO } from 'date-fns';

const CALENDAR_DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;
const INSTANT_PATTERN =
  /^(\d{4}-\d{2}-\d{2})T([0-1][0-9]|2[0-3]):([0-5][0-9])(?::([0-5][0-9])(?:\.\d+)?)?(Z|[+-]\d{2}:?\d{2})?$/;
const UTC_OFFSET_PATTERN = /^(Z|[+-](?:[0-1][0-9]|2[0-3]):[0-5][0-9])$/;

export const SECONDS_PER_DAY = 24 * 60 * 60;

export interface WallClock {
  date: string;
  time: string;
}

function pad(value: number): string {
  return `${value}`.padStart(2, '0');
}

export function formatTimeOfDay(hours: number, minutes: number, seconds = 0): string {
  return `${pad(hours)}:${pad(minutes)}:${pad(seconds)}`;
}

export function secondsOfDay(time: string): number {
  const [hours = 0, minutes = 0, seconds = 0] = time.split(':').map(Number);
  return hours * 3600 + minutes * 60 + seconds;
}

export function timeOfDayFromSeconds(total: number): string {
  return formatTimeOfDay(Math.floor(total / 3600), Math.floor((total % 3600) / 60), total % 60);
}

/**
 * Moves a HH:MM:SS time by whole minutes, clamped to the same day.
 */
export function shiftTimeOfDay(time: string, deltaMinutes: number): string {
  const shifted = secondsOfDay(time) + deltaMinutes * 60;
  return timeOfDayFromSeconds(Math.min(SECONDS_PER_DAY - 1, Math.max(0, shifted)));
}

export function compareTimeOfDay(a: string, b: string): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

export function isCalendarDate(value: string): boolean {
  return CALENDAR_DATE_PATTERN.test(value) && isValid(parseISO(value));
}

export function isUtcOffset(value: string): boolean {
  return UTC_OFFSET_PATTERN.test(value);
}

/**
 * Splits an ISO-8601 date-time into its written calendar date and time-of-day.
 * Returns null when the value is not a valid date-time.
 */
export function toWallClock(instant: string): WallClock | null {
  const match = INSTANT_PATTERN.exec(instant);
  if (!match || !isValid(parseISO(instant))) return null;
  const [, date = '', hours = '00', minutes = '00', seconds = '00'] = match;
  return { date, time: `${hours}:${minutes}:${seconds}` };
}

export function isIsoInstant(value: string): boolean {
  return toWallClock(value) !== null;
}

export function instantToEpochMs(instant: string): number {
  return parseISO(instant).getTime();
}
