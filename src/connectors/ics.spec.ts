import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { format } from 'date-fns';
import { ProducerError } from '../planner/errors';
import { calendarRecordsFromIcs, IcsCalendarProducer } from './ics';

const ICS = [
  'BEGIN:VCALENDAR',
  'VERSION:2.0',
  'PRODID:-//dayplan//tests//EN',
  'BEGIN:VEVENT',
  'UID:design-review@example.test',
  'DTSTAMP:20250110T120000Z',
  'DTSTART:20250115T120000Z',
  'DTEND:20250115T130000Z',
  'SUMMARY:Design review',
  'LOCATION:Room 4',
  'END:VEVENT',
  'BEGIN:VEVENT',
  'UID:retro@example.test',
  'DTSTAMP:20250110T120000Z',
  'DTSTART:20250120T120000Z',
  'DTEND:20250120T123000Z',
  'SUMMARY:Retro',
  'END:VEVENT',
  'END:VCALENDAR',
  '',
].join('\r\n');

function toUtc(instant: string | undefined): string {
  return new Date(instant ?? '').toISOString();
}

describe('calendarRecordsFromIcs', () => {
  it('turns every VEVENT into a calendar record', () => {
    const records = calendarRecordsFromIcs(ICS);

    expect(records).toHaveLength(2);
    expect(records[0]?.summary).toBe('Design review');
    expect(records[0]?.location).toBe('Room 4');
    expect(toUtc(records[0]?.start)).toBe('2025-01-15T12:00:00.000Z');
    expect(toUtc(records[0]?.end)).toBe('2025-01-15T13:00:00.000Z');
    expect(records[1]?.summary).toBe('Retro');
    expect(records[1]?.location).toBeNull();
  });
});

describe('IcsCalendarProducer', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'dayplan-ics-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('only returns events on the requested date', async () => {
    const path = join(dir, 'work.ics');
    await writeFile(path, ICS);
    // Records carry the local offset, so the review lands on the local date of 12:00Z
    const reviewDate = format(new Date('2025-01-15T12:00:00Z'), 'yyyy-MM-dd');

    const records = await new IcsCalendarProducer(path).produce({ date: reviewDate });
    expect(records.map((record) => record.summary)).toEqual(['Design review']);
  });

  it('fails with a producer error when the file is missing', async () => {
    const producer = new IcsCalendarProducer(join(dir, 'missing.ics'));
    await expect(producer.produce({ date: '2025-01-15' })).rejects.toBeInstanceOf(ProducerError);
  });
});
