/**
 * ICS Calendar Producer
 *
 * Reads VEVENTs from an iCalendar file with node-ical and emits raw calendar
 * records. Instants are written with the machine's local offset.
 */

import * as ical from 'node-ical';
import { formatISO } from 'date-fns';
import { ProducerError } from '../planner/errors';
import type { CalendarRecord } from '../planner/input';
import type { ProduceRequest, Producer } from './interfaces';
import { readProducerFile, startsOnRequestedDate } from './json-file';

export type IcsCalendarRecord = Partial<CalendarRecord>;

// node-ical yields either a plain string or `{ val, params }` for text properties
function textValue(value: unknown): string | undefined {
  if (typeof value === 'string') return value;
  if (typeof value === 'object' && value !== null && 'val' in value) {
    return typeof value.val === 'string' ? value.val : undefined;
  }
  return undefined;
}

function isEvent(component: ical.CalendarComponent): component is ical.VEvent {
  return component.type === 'VEVENT';
}

function toCalendarRecord(event: ical.VEvent): IcsCalendarRecord {
  const start: unknown = event.start;
  const end: unknown = event.end;
  const record: IcsCalendarRecord = {
    summary: textValue(event.summary),
    location: textValue(event.location) ?? null,
  };
  if (start instanceof Date) {
    record.start = formatISO(start);
    record.end = formatISO(end instanceof Date ? end : start);
  }
  return record;
}

export function calendarRecordsFromIcs(text: string): IcsCalendarRecord[] {
  return Object.values(ical.sync.parseICS(text)).filter(isEvent).map(toCalendarRecord);
}

export class IcsCalendarProducer implements Producer<IcsCalendarRecord> {
  readonly id = 'ics-calendar';
  readonly name = 'Calendar (ICS file)';

  constructor(private readonly path: string) {}

  async produce(request: ProduceRequest): Promise<IcsCalendarRecord[]> {
    const text = await readProducerFile(this.path, this.id);

    let records: IcsCalendarRecord[];
    try {
      records = calendarRecordsFromIcs(text);
    } catch (error) {
      throw new ProducerError(`${this.path} is not a readable iCalendar file`, this.id, {
        cause: error,
      });
    }
    return records.filter((record) => startsOnRequestedDate(record, request));
  }
}
