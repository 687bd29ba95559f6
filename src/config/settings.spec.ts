import { ConfigurationError } from '../planner/errors';
import { loadSettings, toPlannerConfig } from './settings';

describe('loadSettings', () => {
  it('falls back to defaults when nothing is set', () => {
    expect(loadSettings({})).toEqual({
      logLevel: 'info',
      commuteHour: 8,
      commuteLeadMinutes: 15,
      utcOffset: 'Z',
      calendarFilePath: 'mock_data/calendar_events.json',
      emailFilePath: 'mock_data/email_tasks.json',
      contextFilePath: 'mock_data/context_recommendations.json',
    });
  });

  it('reads and coerces environment variables', () => {
    const settings = loadSettings({
      LOG_LEVEL: 'DEBUG',
      COMMUTE_HOUR: '9',
      COMMUTE_LEAD_MINUTES: '30',
      PLAN_UTC_OFFSET: '-05:00',
      MOCK_CALENDAR_FILE_PATH: '/data/calendar.ics',
    });

    expect(settings.logLevel).toBe('debug');
    expect(settings.commuteHour).toBe(9);
    expect(settings.commuteLeadMinutes).toBe(30);
    expect(settings.calendarFilePath).toBe('/data/calendar.ics');
    expect(toPlannerConfig(settings)).toEqual({
      commuteHour: 9,
      commuteLeadMinutes: 30,
      utcOffset: '-05:00',
    });
  });

  it('treats blank variables as unset', () => {
    expect(loadSettings({ COMMUTE_HOUR: '  ', LOG_LEVEL: '' }).commuteHour).toBe(8);
  });

  it('names the variable that failed', () => {
    try {
      loadSettings({ COMMUTE_HOUR: '25', PLAN_UTC_OFFSET: 'CET' });
      throw new Error('expected a configuration error');
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigurationError);
      const issues = error instanceof ConfigurationError ? error.issues : [];
      expect(issues).toHaveLength(2);
      expect(issues[0]).toMatch(/^COMMUTE_HOUR: /);
      expect(issues[1]).toBe('PLAN_UTC_OFFSET: must be Z or ±HH:MM');
    }
  });
});
