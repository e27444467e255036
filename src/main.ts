import 'reflect-metadata';
import { INestApplicationContext, LoggerService } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { CronJob } from 'cron';
import { AppModule } from './app.module';
import { ConfigurationError, REMINDER_CONFIG, ReminderConfig, resolveLogFilePath } from './config/reminder.config';
import { ReminderService } from './reminder/reminder.service';
import { RunLogger } from './run-report/run-logger';

export const EXIT_CONFIGURATION_ERROR = 1;

/**
 * Runs the reminder pipeline on every tick of the cron expression (UTC).
 * A tick that fires while the previous run is still going is skipped.
 */
export function scheduleReminders(reminders: Pick<ReminderService, 'run'>, schedule: string, logger: LoggerService): CronJob {
  let running = false;

  return CronJob.from({
    cronTime: schedule,
    timeZone: 'UTC',
    start: true,
    onTick: async () => {
      if (running) {
        logger.warn('Previous reminder run is still in progress; skipping this tick.', 'Scheduler');
        return;
      }
      running = true;
      try {
        await reminders.run();
      } catch (error) {
        logger.error(`Reminder run failed: ${error instanceof Error ? error.message : String(error)}`, 'Scheduler');
      } finally {
        running = false;
      }
    },
  });
}

/**
 * Returns the process exit code, or undefined when the process stays up to
 * serve a schedule.
 */
export async function bootstrap(): Promise<number | undefined> {
  const logger = new RunLogger(resolveLogFilePath(process.env));

  let app: INestApplicationContext;
  try {
    app = await NestFactory.createApplicationContext(AppModule, { logger, abortOnError: false });
  } catch (error) {
    if (error instanceof ConfigurationError) {
      logger.error(`Configuration error, no mail was sent: ${error.message}`, 'Bootstrap');
      return EXIT_CONFIGURATION_ERROR;
    }
    throw error;
  }

  const config = app.get<ReminderConfig>(REMINDER_CONFIG);
  const reminders = app.get(ReminderService);

  if (config.schedule) {
    app.enableShutdownHooks();
    scheduleReminders(reminders, config.schedule, logger);
    logger.log(`Reminders scheduled with "${config.schedule}" (UTC).`, 'Bootstrap');
    return undefined;
  }

  try {
    await reminders.run();
  } finally {
    await app.close();
  }
  return 0;
}

if (require.main === module) {
  bootstrap().then(
    (exitCode) => {
      if (exitCode !== undefined) {
        process.exitCode = exitCode;
      }
    },
    (error: unknown) => {
      console.error(error);
      process.exitCode = 1;
    },
  );
}
