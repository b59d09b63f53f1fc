import { plainToInstance } from 'class-transformer';
import {
  IsEnum,
  IsIn,
  IsInt,
  IsNotEmpty,
  IsOptional,
  IsString,
  Max,
  Min,
  ValidateIf,
  validateSync,
} from 'class-validator';

export enum NodeEnv {
  Development = 'development',
  Staging = 'staging',
  Production = 'production',
  Test = 'test',
}

export class EnvironmentVariables {
  @IsEnum(NodeEnv)
  @IsOptional()
  NODE_ENV?: NodeEnv;

  @IsInt()
  @Min(1)
  @Max(65535)
  @IsOptional()
  PORT?: number;

  @IsString()
  @IsNotEmpty()
  @IsOptional()
  API_PREFIX?: string;

  @IsIn(['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly'])
  @IsOptional()
  LOG_LEVEL?: string;

  @IsIn(['json', 'pretty'])
  @IsOptional()
  LOG_FORMAT?: string;

  @IsIn(['memory', 'postgres'])
  @IsOptional()
  STORE_DRIVER?: string;

  @ValidateIf((env: EnvironmentVariables) => env.STORE_DRIVER === 'postgres')
  @IsString()
  @IsNotEmpty()
  DATABASE_URL?: string;

  @IsInt()
  @Min(1)
  @Max(200)
  @IsOptional()
  DATABASE_POOL_MAX?: number;

  @IsInt()
  @Min(0)
  @Max(50)
  @IsOptional()
  STORE_CONFLICT_RETRIES?: number;

  @IsInt()
  @Min(0)
  @IsOptional()
  STORE_CONFLICT_BACKOFF_MS?: number;

  @IsInt()
  @Min(0)
  @Max(4)
  @IsOptional()
  CURRENCY_MINOR_DIGITS?: number;

  @IsInt()
  @Min(0)
  @IsOptional()
  LOYALTY_RATE_BPS?: number;

  @IsInt()
  @Min(0)
  @IsOptional()
  RESERVATION_TTL_MINUTES?: number;

  @IsInt()
  @Min(0)
  @IsOptional()
  RESERVATION_SWEEP_INTERVAL_MS?: number;

  @IsInt()
  @Min(0)
  @IsOptional()
  LOW_STOCK_DEFAULT_THRESHOLD?: number;

  @IsIn(['on_hand', 'available'])
  @IsOptional()
  LOW_STOCK_BASIS?: string;

  @IsInt()
  @Min(1000)
  @IsOptional()
  RATE_LIMIT_WINDOW_MS?: number;

  @IsInt()
  @Min(1)
  @IsOptional()
  RATE_LIMIT_MAX_REQUESTS?: number;
}

export function validate(config: Record<string, unknown>) {
  const validatedConfig = plainToInstance(EnvironmentVariables, config, {
    enableImplicitConversion: true,
  });

  const errors = validateSync(validatedConfig, { skipMissingProperties: false });
  if (errors.length > 0) {
    const messages = errors
      .map((error) => Object.values(error.constraints ?? {}).join(', '))
      .join('; ');
    throw new Error(`Config validation error: ${messages}`);
  }

  return validatedConfig;
}
