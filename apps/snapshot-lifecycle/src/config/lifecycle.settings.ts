import { ConfigService } from '@nestjs/config';
import { plainToInstance } from 'class-transformer';
import { validateSync } from 'class-validator';
import { ConfigurationError, toValidationFields } from '../common/errors';
import { EnvironmentDto, SweepScope } from './environment.dto';

export const LIFECYCLE_SETTINGS = Symbol('LIFECYCLE_SETTINGS');

export const DEFAULT_RETENTION_DAYS = 30;
export const DEFAULT_DESCRIPTION_PREFIX = 'AutoSnapshot';

export type LifecycleSettings = {
  volumeId: string;
  retentionDays: number;
  descriptionPrefix: string;
  sweepScope: SweepScope;
  dryRun: boolean;
  snsTopicArn?: string;
  region?: string;
};

const ENV_KEYS = [
  'VOLUME_ID',
  'RETENTION_DAYS',
  'SNAPSHOT_DESCRIPTION_PREFIX',
  'SNAPSHOT_SWEEP_SCOPE',
  'DRY_RUN',
  'SNS_TOPIC_ARN',
  'AWS_REGION',
] as const;

/**
 * Reads and validates the lifecycle settings. Throws ConfigurationError
 * listing every offending variable.
 */
export function loadLifecycleSettings(configService: ConfigService): LifecycleSettings {
  const raw: Record<string, unknown> = {};
  for (const key of ENV_KEYS) {
    raw[key] = configService.get<unknown>(key);
  }

  const env = plainToInstance(EnvironmentDto, raw);
  const errors = validateSync(env, { skipMissingProperties: false });
  if (errors.length > 0) {
    const fields = toValidationFields(errors);
    throw new ConfigurationError(
      `Invalid lifecycle configuration: ${fields.map((f) => f.field).join(', ')}`,
      fields,
    );
  }

  return {
    volumeId: env.VOLUME_ID,
    retentionDays: env.RETENTION_DAYS ?? DEFAULT_RETENTION_DAYS,
    descriptionPrefix: env.SNAPSHOT_DESCRIPTION_PREFIX ?? DEFAULT_DESCRIPTION_PREFIX,
    sweepScope: env.SNAPSHOT_SWEEP_SCOPE ?? 'account',
    dryRun: env.DRY_RUN ?? false,
    ...(env.SNS_TOPIC_ARN && { snsTopicArn: env.SNS_TOPIC_ARN }),
    ...(env.AWS_REGION && { region: env.AWS_REGION }),
  };
}
