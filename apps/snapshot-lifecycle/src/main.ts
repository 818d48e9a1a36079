import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { LoggerService } from './common/logger';
import { DEFAULT_LIFECYCLE_CRON } from './lifecycle/snapshot-lifecycle.service';
import { SchedulerModule } from './scheduler.module';

async function bootstrapScheduler() {
  const app = await NestFactory.createApplicationContext(SchedulerModule, {
    bufferLogs: true,
    abortOnError: false,
  });
  app.useLogger(await app.resolve(LoggerService));
  const logger = new Logger('Scheduler');
  logger.log(
    `Snapshot lifecycle scheduler started (cron="${DEFAULT_LIFECYCLE_CRON}", enabled=${
      process.env.RUN_LIFECYCLE === 'true'
    })`,
  );

  let shuttingDown = false;
  const shutdown = async (signal: string) => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.log(`Received ${signal}, shutting down gracefully...`);
    try {
      await app.close();
      logger.log('Scheduler shut down');
    } catch (err) {
      const msg = err instanceof Error ? err.message : 'Unknown error';
      logger.error(`Error during shutdown: ${msg}`);
    }
    process.exit(0);
  };

  process.on('SIGINT', () => void shutdown('SIGINT'));
  process.on('SIGTERM', () => void shutdown('SIGTERM'));

  process.on('unhandledRejection', (reason) => {
    const msg = reason instanceof Error ? reason.message : String(reason);
    logger.error(`Unhandled rejection in scheduler: ${msg}`);
  });
}

bootstrapScheduler().catch((err) => {
  const msg = err instanceof Error ? err.message : String(err);
  Logger.error(`Scheduler failed to start: ${msg}`);
  process.exit(1);
});
