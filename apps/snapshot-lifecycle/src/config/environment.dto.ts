import { Transform, Type } from 'class-transformer';
import { IsBoolean, IsIn, IsInt, IsOptional, IsString, Matches, Max, Min } from 'class-validator';

export const MAX_RETENTION_DAYS = 3650;

export const SWEEP_SCOPES = ['account', 'managed'] as const;
export type SweepScope = (typeof SWEEP_SCOPES)[number];

const toBoolean = ({ value }: { value: unknown }) => {
  if (typeof value === 'string') {
    const normalized = value.trim().toLowerCase();
    if (normalized === 'true') return true;
    if (normalized === 'false' || normalized === '') return false;
  }
  return value;
};

const blankToUndefined = ({ value }: { value: unknown }) =>
  typeof value === 'string' && value.trim() === '' ? undefined : value;

export class EnvironmentDto {
  @IsString()
  @Matches(/^vol-[0-9a-f]+$/, { message: 'VOLUME_ID must look like vol-0123456789abcdef0' })
  VOLUME_ID!: string;

  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(1)
  @Max(MAX_RETENTION_DAYS)
  RETENTION_DAYS?: number;

  @IsOptional()
  @Transform(blankToUndefined)
  @IsString()
  SNAPSHOT_DESCRIPTION_PREFIX?: string;

  @IsOptional()
  @Transform(blankToUndefined)
  @IsIn(SWEEP_SCOPES)
  SNAPSHOT_SWEEP_SCOPE?: SweepScope;

  @IsOptional()
  @Transform(toBoolean)
  @IsBoolean()
  DRY_RUN?: boolean;

  @IsOptional()
  @Transform(blankToUndefined)
  @Matches(/^arn:aws[\w-]*:sns:/, { message: 'SNS_TOPIC_ARN must be an SNS topic ARN' })
  SNS_TOPIC_ARN?: string;

  @IsOptional()
  @Transform(blankToUndefined)
  @IsString()
  AWS_REGION?: string;
}
