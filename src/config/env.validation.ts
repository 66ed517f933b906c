import { plainToInstance, Type } from 'class-transformer';
import {
  IsInt,
  IsISO8601,
  IsOptional,
  IsString,
  Length,
  Min,
  validateSync,
} from 'class-validator';
import { ConfigurationError } from '../common/errors';

export class EnvironmentVariables {
  @IsOptional()
  @IsString()
  YOUTUBE_API_KEY?: string;

  @IsOptional()
  @IsString()
  CHANNEL_ID?: string;

  @IsOptional()
  @IsString()
  CHANNEL_USERNAME?: string;

  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(1)
  MAX_VIDEOS?: number;

  @IsOptional()
  @IsISO8601()
  PUBLISHED_AFTER?: string;

  @IsOptional()
  @IsISO8601()
  PUBLISHED_BEFORE?: string;

  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(0)
  BUFFER_DAYS?: number;

  @IsOptional()
  @IsString()
  OUTPUT_DIR?: string;

  @IsOptional()
  @IsString()
  @Length(2, 2)
  CATEGORY_REGION?: string;

  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(0)
  REQUEST_DELAY_MS?: number;

  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(0)
  RATE_LIMIT_DELAY_MS?: number;

  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(1)
  HTTP_TIMEOUT_MS?: number;
}

/** `validate` hook for `ConfigModule.forRoot`. Blank values count as unset. */
export function validateEnv(config: Record<string, unknown>) {
  const present = Object.fromEntries(
    Object.entries(config).filter(
      ([, v]) => !(typeof v === 'string' && v.trim() === ''),
    ),
  );
  const validated = plainToInstance(EnvironmentVariables, present);
  const errors = validateSync(validated, { skipMissingProperties: false });

  if (errors.length > 0) {
    const details = errors
      .map((e) => Object.values(e.constraints ?? {}).join(', '))
      .join('; ');
    throw new ConfigurationError(`Invalid environment: ${details}`);
  }
  return validated;
}
