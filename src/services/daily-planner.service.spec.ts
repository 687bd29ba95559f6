import { StaticProducer } from '../connectors/static';
import type { Producer } from '../connectors/interfaces';
import type { Logger } from '../logging/logger';
import { PlanValidationError, ProducerError } from '../planner/errors';
import { DailyPlannerService } from './daily-planner.service';

function createMockLogger(): jest.Mocked<Logger> {
  return { debug: jest.fn(), info: jest.fn(), warn: jest.fn(), error: jest.fn() };
}

const calendar = new StaticProducer('fixture-calendar', [
  { start: '2025-01-15T10:00:00Z', end: '2025-01-15T11:00:00Z', summary: 'Planning' },
]);
const email = new StaticProducer('fixture-email', [
  { description: 'Book flights', priority: 'high', source_email_id: 'msg-1' },
  { description: 'Broken', priority: 'whenever', source_email_id: 'msg-2' },
]);
const context = new StaticProducer('fixture-context', [
  { kind: 'traffic', detail_payload: { delay_minutes: 20 }, impact_label: 'commute' },
]);

describe('DailyPlannerService', () => {
  it('collects from every producer and returns plan, document and rejections', async () => {
    const service = new DailyPlannerService({ producers: { calendar, email, context } });

    const result = await service.run('2025-01-15');

    expect(result.producerFailures).toEqual([]);
    expect(result.conflicts).toEqual([]);
    expect(result.freeSlots).toEqual([
      { start: '09:00:00', end: '10:00:00', durationMinutes: 60 },
      { start: '11:00:00', end: '17:00:00', durationMinutes: 360 },
    ]);
    expect(result.document.plan.map((item) => [item.time, item.item_type])).toEqual([
      ['07:45:00', 'recommendation'],
      ['09:00:00', 'task'],
      ['10:00:00', 'event'],
    ]);
    expect(result.document.summary).toBe(result.plan.summary);
    expect(result.rejected).toEqual([
      {
        source: 'email',
        index: 1,
        reason: 'unknown priority "whenever"',
        record: { description: 'Broken', priority: 'whenever', source_email_id: 'msg-2' },
      },
    ]);
  });

  it('applies its planner config', async () => {
    const service = new DailyPlannerService({
      producers: { calendar, email, context },
      config: { commuteHour: 7, commuteLeadMinutes: 30, utcOffset: '+01:00' },
    });

    const { document } = await service.run('2025-01-15');
    expect(document.plan[0]).toEqual({
      time: '06:30:00',
      item_type: 'recommendation',
      details: {
        kind: 'traffic',
        details: { delay_minutes: 20 },
        impact_label: 'commute',
        impact_time: '2025-01-15T06:30:00+01:00',
      },
      priority: null,
    });
  });

  it('plans without a producer that fails and reports it', async () => {
    const logger = createMockLogger();
    const unreachable: Producer = {
      id: 'email-api',
      name: 'Email API',
      produce: async () => {
        throw new ProducerError('Mailbox unavailable', 'email-api');
      },
    };
    const service = new DailyPlannerService({
      producers: { calendar, email: unreachable, context },
      logger,
    });

    const result = await service.run('2025-01-15');

    expect(result.producerFailures).toEqual([
      { source: 'email', producerId: 'email-api', message: 'Mailbox unavailable' },
    ]);
    expect(result.plan.summary).toBe('Plan for 2025-01-15. Events: 1. Tasks: 0. Recommendations: 1.');
    expect(logger.error).toHaveBeenCalledWith('Planner', 'Email API failed: Mailbox unavailable');
  });

  it('rejects a malformed date without calling any producer', async () => {
    const produce = jest.fn(async () => []);
    const spy: Producer = { id: 'spy', name: 'Spy', produce };
    const service = new DailyPlannerService({
      producers: { calendar: spy, email: spy, context: spy },
    });

    await expect(service.run('2025-13-01')).rejects.toBeInstanceOf(PlanValidationError);
    expect(produce).not.toHaveBeenCalled();
  });

  it('asks producers for the requested date', async () => {
    const produce = jest.fn(async () => []);
    const spy: Producer = { id: 'spy', name: 'Spy', produce };
    const service = new DailyPlannerService({
      producers: { calendar: spy, email: spy, context: spy },
    });

    const { plan } = await service.run('2025-06-01');

    expect(produce).toHaveBeenCalledTimes(3);
    expect(produce).toHaveBeenCalledWith({ date: '2025-06-01' });
    expect(plan.plan).toEqual([]);
  });
});
