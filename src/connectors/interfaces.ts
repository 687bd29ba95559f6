import type { CalendarRecord, ContextRecord, EmailTaskRecord } from '../planner/input';

export interface ProduceRequest {
  // Plan date, YYYY-MM-DD
  date: string;
}

/**
 * A collaborator that decides which raw records exist for a day. How it does so
 * (API, model, file, fixture) is its own business; the planner only consumes
 * the returned records.
 */
export interface Producer<TRecord = unknown> {
  id: string;
  name: string;
  produce(request: ProduceRequest): Promise<TRecord[]>;
}

export type CalendarProducer = Producer<CalendarRecord>;
export type EmailTaskProducer = Producer<EmailTaskRecord>;
export type ContextProducer = Producer<ContextRecord>;

export type ProducerSource = 'calendar' | 'email' | 'context';

export type CollaboratorProducers = Record<ProducerSource, Producer>;
