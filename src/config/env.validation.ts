import { Transform, Type, plainToInstance } from 'class-transformer';
import {
  IsBoolean,
  IsInt,
  IsNotEmpty,
  IsString,
  IsUrl,
  Max,
  Min,
  validateSync,
} from 'class-validator';
import { DEFAULT_API_TIMEOUT_MS } from '../core';
import { DEFAULT_LOG_LEVEL } from './log-level';

const TRUE_FLAGS = ['true', '1', 'yes'];

/**
 * "true", "1" and "yes" (any case) are true; anything else is false
 */
export function parseFlag(value: unknown): boolean {
  if (typeof value === 'boolean') {
    return value;
  }
  if (typeof value === 'string') {
    return TRUE_FLAGS.includes(value.trim().toLowerCase());
  }
  return false;
}

/**
 * Process environment after validation, with defaults applied
 */
export class EnvironmentVariables {
  @IsString()
  @IsNotEmpty()
  BOT_TOKEN!: string;

  @IsString()
  LOG_LEVEL: string = DEFAULT_LOG_LEVEL;

  @IsString()
  @IsNotEmpty()
  USER_TOKENS_FILE: string = 'api_tokens.json';

  @Transform(({ value }) => parseFlag(value))
  @IsBoolean()
  SKIP_VERIFY: boolean = false;

  @IsString()
  @IsNotEmpty()
  WEB_SERVER_HOST: string = '0.0.0.0';

  @Type(() => Number)
  @IsInt()
  @Min(1)
  @Max(65535)
  WEB_SERVER_PORT: number = 8080;

  @IsString()
  @IsNotEmpty()
  WEBHOOK_API_KEY!: string;

  @IsUrl({ require_tld: false, require_protocol: true, protocols: ['http', 'https'] })
  MERCHANT_API_URL_START: string = 'http://127.0.0.1:8000/zenithion/api/v1/';

  @Type(() => Number)
  @IsInt()
  @Min(1)
  MERCHANT_API_TIMEOUT_MS: number = DEFAULT_API_TIMEOUT_MS;
}

/**
 * ConfigModule validate hook; throws listing every invalid variable
 */
export function validate(config: Record<string, unknown>): EnvironmentVariables {
  const validated = plainToInstance(EnvironmentVariables, config);
  const errors = validateSync(validated, { skipMissingProperties: false });

  if (errors.length > 0) {
    const details = errors
      .map((error) => `- ${error.property}: ${Object.values(error.constraints ?? {}).join(', ')}`)
      .join('\n');
    throw new Error(`Invalid environment configuration:\n${details}`);
  }

  return validated;
}
