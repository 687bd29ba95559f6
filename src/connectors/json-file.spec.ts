import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { ProducerError } from '../planner/errors';
import {
  createCalendarFileProducer,
  createEmailTaskFileProducer,
  startsOnRequestedDate,
} from './json-file';

describe('JSON file producers', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'dayplan-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  async function fixture(name: string, content: string): Promise<string> {
    const path = join(dir, name);
    await writeFile(path, content);
    return path;
  }

  it('keeps calendar records for the requested date and those without a start', async () => {
    const path = await fixture(
      'calendar.json',
      JSON.stringify([
        { start: '2025-01-15T09:00:00-05:00', end: '2025-01-15T10:00:00-05:00', summary: 'Today' },
        { start: '2025-01-16T09:00:00-05:00', end: '2025-01-16T10:00:00-05:00', summary: 'Tomorrow' },
        { end: '2025-01-15T10:00:00Z', summary: 'No start' },
      ])
    );

    const records = await createCalendarFileProducer(path).produce({ date: '2025-01-15' });
    expect(records).toEqual([
      { start: '2025-01-15T09:00:00-05:00', end: '2025-01-15T10:00:00-05:00', summary: 'Today' },
      { end: '2025-01-15T10:00:00Z', summary: 'No start' },
    ]);
  });

  it('returns every email record unfiltered', async () => {
    const path = await fixture(
      'email.json',
      JSON.stringify([{ description: 'a' }, { description: 'b' }])
    );
    expect(await createEmailTaskFileProducer(path).produce({ date: '2025-01-15' })).toHaveLength(2);
  });

  it('fails with a producer error when the file is missing', async () => {
    const producer = createEmailTaskFileProducer(join(dir, 'missing.json'));
    await expect(producer.produce({ date: '2025-01-15' })).rejects.toBeInstanceOf(ProducerError);
  });

  it('fails when the file is not a JSON array', async () => {
    const notJson = await fixture('broken.json', '[{');
    const notArray = await fixture('object.json', '{"records": []}');

    await expect(createEmailTaskFileProducer(notJson).produce({ date: '2025-01-15' })).rejects.toThrow(
      `${notJson} is not valid JSON`
    );
    await expect(
      createEmailTaskFileProducer(notArray).produce({ date: '2025-01-15' })
    ).rejects.toThrow(`${notArray} must contain a JSON array of records`);
  });

  it('judges the start date in the offset it was written in', () => {
    const request = { date: '2025-01-15' };
    expect(startsOnRequestedDate({ start: '2025-01-15T23:30:00-05:00' }, request)).toBe(true);
    expect(startsOnRequestedDate({ start: '2025-01-16T04:30:00Z' }, request)).toBe(false);
    expect(startsOnRequestedDate({ start: 'soon' }, request)).toBe(true);
    expect(startsOnRequestedDate('not a record', request)).toBe(true);
  });
});
