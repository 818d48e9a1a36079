import 'reflect-metadata';
import { HttpStatus, Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import type { Context, ScheduledEvent } from 'aws-lambda';
import { plainToInstance } from 'class-transformer';
import { validateSync } from 'class-validator';
import { AppModule } from './app.module';
import { BaseAppError, ValidationError, describeError, toValidationFields } from './common/errors';
import { LoggerService } from './common/logger';
import { LIFECYCLE_SETTINGS, LifecycleSettings } from './config/lifecycle.settings';
import { LifecycleRunDto } from './lifecycle/dto/lifecycle-run.dto';
import { buildRunSummary } from './lifecycle/lifecycle-summary';
import { LifecycleRunOptions } from './lifecycle/lifecycle.types';
import { SnapshotLifecycleService } from './lifecycle/snapshot-lifecycle.service';

export type LifecycleInvocationEvent = ScheduledEvent | Record<string, unknown> | null | undefined;

export type LifecycleInvocationResult = {
  statusCode: number;
  body: string;
};

export type LifecycleRuntime = {
  service: Pick<SnapshotLifecycleService, 'run'>;
  settings: LifecycleSettings;
  logger: Pick<LoggerService, 'setInvocationId'>;
};

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

export const isScheduledEvent = (event: unknown): boolean =>
  isRecord(event) && (event.source === 'aws.events' || event['detail-type'] === 'Scheduled Event');

/**
 * Scheduled events carry no options. Anything else is an operator call whose
 * payload may override `dryRun` and `retentionDays`.
 */
export function parseInvocation(event: LifecycleInvocationEvent): LifecycleRunOptions {
  if (isScheduledEvent(event)) {
    return { invokedBy: 'schedule' };
  }

  const payload = plainToInstance(LifecycleRunDto, isRecord(event) ? event : {});
  const errors = validateSync(payload, { whitelist: true });
  if (errors.length > 0) {
    throw new ValidationError('Invalid invocation payload', toValidationFields(errors));
  }

  return {
    invokedBy: 'manual',
    ...(payload.dryRun !== undefined && { dryRun: payload.dryRun }),
    ...(payload.retentionDays !== undefined && { retentionDays: payload.retentionDays }),
  };
}

const respond = (statusCode: number, body: unknown): LifecycleInvocationResult => ({
  statusCode,
  body: JSON.stringify(body, null, 2),
});

const errorResult = (error: unknown): LifecycleInvocationResult => {
  if (error instanceof BaseAppError) {
    return respond(error.statusCode, error.toJSON());
  }
  return respond(HttpStatus.INTERNAL_SERVER_ERROR, { error: `Unexpected error: ${describeError(error)}` });
};

export async function bootstrapRuntime(): Promise<LifecycleRuntime> {
  // Without abortOnError: false a failing provider factory calls process.abort().
  const app = await NestFactory.createApplicationContext(AppModule, {
    bufferLogs: true,
    abortOnError: false,
  });
  const logger = await app.resolve(LoggerService);
  app.useLogger(logger);
  return {
    service: app.get(SnapshotLifecycleService),
    settings: app.get<LifecycleSettings>(LIFECYCLE_SETTINGS),
    logger,
  };
}

/**
 * Builds the invocation handler. The runtime is created once per container
 * and reused by warm invocations; a failed bootstrap is retried next time.
 */
export function createHandler(bootstrap: () => Promise<LifecycleRuntime> = bootstrapRuntime) {
  const logger = new Logger('LifecycleHandler');
  let runtime: Promise<LifecycleRuntime> | null = null;

  const getRuntime = () => {
    if (!runtime) {
      runtime = bootstrap().catch((error: unknown) => {
        runtime = null;
        throw error;
      });
    }
    return runtime;
  };

  return async (event: LifecycleInvocationEvent, context?: Context): Promise<LifecycleInvocationResult> => {
    try {
      const { service, settings, logger: appLogger } = await getRuntime();
      appLogger.setInvocationId(context?.awsRequestId);

      const options = parseInvocation(event);
      const report = await service.run(settings.volumeId, options);
      const summary = buildRunSummary(report);

      if (report.status === 'succeeded') {
        return respond(HttpStatus.OK, {
          message: 'Snapshot lifecycle run completed',
          summary,
          report,
        });
      }
      return respond(HttpStatus.INTERNAL_SERVER_ERROR, {
        error: report.error?.message || 'Snapshot lifecycle run failed',
        summary,
        report,
      });
    } catch (error) {
      logger.error(`Lifecycle invocation failed: ${describeError(error)}`);
      return errorResult(error);
    }
  };
}

export const handler = createHandler();
