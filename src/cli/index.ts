#!/usr/bin/env node
import { Command } from 'commander';
import { readFileSync, writeFileSync } from 'node:fs';
import { format } from 'date-fns';
import { loadSettings, toPlannerConfig } from '../config/settings';
import { calendarRecordsFromIcs, IcsCalendarProducer } from '../connectors/ics';
import {
  createCalendarFileProducer,
  createContextFileProducer,
  createEmailTaskFileProducer,
  startsOnRequestedDate,
} from '../connectors/json-file';
import { createConsoleLogger } from '../logging/logger';
import { PlanConsolidationError } from '../planner/errors';
import { DailyPlannerService } from '../services/daily-planner.service';

interface PlanCommandOptions {
  calendar?: string;
  email?: string;
  context?: string;
  output?: string;
  debug?: boolean;
}

interface ImportIcsCommandOptions {
  file: string;
  date?: string;
  output?: string;
}

const fallbackLogger = createConsoleLogger('info');

const program = new Command();

program
  .name('dayplan')
  .description('Consolidates calendar events, email tasks and context recommendations into a daily plan')
  .version('1.0.0');

program
  .command('plan')
  .description('Build the consolidated plan for a date')
  .argument('[date]', 'Plan date in YYYY-MM-DD format', format(new Date(), 'yyyy-MM-dd'))
  .option('-c, --calendar <path>', 'Calendar records (.json or .ics)')
  .option('-e, --email <path>', 'Email task records (.json)')
  .option('-x, --context <path>', 'Context recommendation records (.json)')
  .option('-o, --output <path>', 'Also write the plan JSON to this file')
  .option('--debug', 'Enable debug logging')
  .action(async (date: string, options: PlanCommandOptions) => {
    try {
      const settings = loadSettings();
      const logger = createConsoleLogger(options.debug ? 'debug' : settings.logLevel);
      const calendarPath = options.calendar ?? settings.calendarFilePath;

      const service = new DailyPlannerService({
        producers: {
          calendar: calendarPath.toLowerCase().endsWith('.ics')
            ? new IcsCalendarProducer(calendarPath)
            : createCalendarFileProducer(calendarPath),
          email: createEmailTaskFileProducer(options.email ?? settings.emailFilePath),
          context: createContextFileProducer(options.context ?? settings.contextFilePath),
        },
        config: toPlannerConfig(settings),
        logger,
      });

      const { document } = await service.run(date);
      const json = JSON.stringify(document, null, 2);
      process.stdout.write(`${json}\n`);

      if (options.output) {
        writeFileSync(options.output, json);
        logger.info('CLI', `Saved plan to ${options.output}`);
      }
    } catch (error) {
      if (!(error instanceof PlanConsolidationError)) throw error;
      fallbackLogger.error('CLI', error.message);
      process.exitCode = 1;
    }
  });

program
  .command('import-ics')
  .description('Convert an ICS file into calendar records')
  .requiredOption('-f, --file <path>', 'Path of the .ics file')
  .option('-d, --date <date>', 'Only keep events starting on this date (YYYY-MM-DD)')
  .option('-o, --output <path>', 'Path of the JSON output file')
  .action((options: ImportIcsCommandOptions) => {
    const { date } = options;
    const records = calendarRecordsFromIcs(readFileSync(options.file, 'utf-8')).filter(
      (record) => !date || startsOnRequestedDate(record, { date })
    );
    const json = JSON.stringify(records, null, 2);

    if (options.output) {
      writeFileSync(options.output, json);
      process.stdout.write(`Saved ${records.length} calendar record(s) to ${options.output}\n`);
    } else {
      process.stdout.write(`${json}\n`);
    }
  });

program.parseAsync(process.argv).catch((error: unknown) => {
  fallbackLogger.error('CLI', 'Unexpected failure', error);
  process.exitCode = 1;
});
