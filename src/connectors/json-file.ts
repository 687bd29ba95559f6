/**
 * JSON File Producers
 *
 * Load collaborator records from JSON files on disk (mock data, exports from
 * other tools). Each file holds a JSON array of raw records.
 */

import { readFile } from 'node:fs/promises';
import { ProducerError } from '../planner/errors';
import { toWallClock } from '../planner/time-of-day';
import type { ProduceRequest, Producer } from './interfaces';

export interface JsonFileProducerOptions {
  id: string;
  name?: string;
  path: string;
  filter?: (record: unknown, request: ProduceRequest) => boolean;
}

export async function readProducerFile(path: string, producerId: string): Promise<string> {
  try {
    return await readFile(path, 'utf-8');
  } catch (error) {
    throw new ProducerError(`Could not read ${path}`, producerId, { cause: error });
  }
}

export class JsonFileProducer implements Producer {
  readonly id: string;
  readonly name: string;
  private readonly path: string;
  private readonly filter?: (record: unknown, request: ProduceRequest) => boolean;

  constructor(options: JsonFileProducerOptions) {
    this.id = options.id;
    this.name = options.name ?? options.id;
    this.path = options.path;
    this.filter = options.filter;
  }

  async produce(request: ProduceRequest): Promise<unknown[]> {
    const text = await readProducerFile(this.path, this.id);

    let data: unknown;
    try {
      data = JSON.parse(text);
    } catch (error) {
      throw new ProducerError(`${this.path} is not valid JSON`, this.id, { cause: error });
    }
    if (!Array.isArray(data)) {
      throw new ProducerError(`${this.path} must contain a JSON array of records`, this.id);
    }

    const { filter } = this;
    const records: unknown[] = data;
    return filter ? records.filter((record) => filter(record, request)) : records;
  }
}

/**
 * Keeps records that start on the requested date. Records without a readable
 * start are kept so the normalizer can report them.
 */
export function startsOnRequestedDate(record: unknown, request: ProduceRequest): boolean {
  if (typeof record !== 'object' || record === null || !('start' in record)) return true;
  const { start } = record;
  if (typeof start !== 'string') return true;
  const clock = toWallClock(start);
  return clock === null || clock.date === request.date;
}

export function createCalendarFileProducer(path: string): JsonFileProducer {
  return new JsonFileProducer({
    id: 'calendar-file',
    name: 'Calendar (JSON file)',
    path,
    filter: startsOnRequestedDate,
  });
}

export function createEmailTaskFileProducer(path: string): JsonFileProducer {
  return new JsonFileProducer({ id: 'email-file', name: 'Email tasks (JSON file)', path });
}

export function createContextFileProducer(path: string): JsonFileProducer {
  return new JsonFileProducer({ id: 'context-file', name: 'Context (JSON file)', path });
}
