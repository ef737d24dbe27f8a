import { plainToInstance } from 'class-transformer';
import {
  IsBooleanString,
  IsIn,
  IsInt,
  IsNumber,
  IsOptional,
  IsString,
  Max,
  Min,
  validateSync,
} from 'class-validator';

/**
 * Environment variables understood by the gateway. Everything is optional;
 * defaults live in `buildAdmissionOptions`.
 */
export class EnvironmentVariables {
  @IsOptional()
  @IsIn(['development', 'staging', 'production', 'test'])
  NODE_ENV?: string;

  @IsOptional()
  @IsInt()
  @Min(1)
  @Max(65535)
  PORT?: number;

  @IsOptional()
  @IsIn(['error', 'warn', 'info', 'verbose', 'debug'])
  LOG_LEVEL?: string;

  @IsOptional()
  @IsIn(['redis', 'memory'])
  COUNTER_STORE_DRIVER?: string;

  @IsOptional()
  @IsString()
  REDIS_URL?: string;

  @IsOptional()
  @IsInt()
  @Min(1)
  COUNTER_STORE_TIMEOUT_MS?: number;

  @IsOptional()
  @IsInt()
  @Min(0)
  @Max(50)
  COUNTER_STORE_MAX_CAS_RETRIES?: number;

  @IsOptional()
  @IsIn(['open', 'closed'])
  ADMISSION_FAIL_POLICY?: string;

  @IsOptional()
  @IsString()
  ADMISSION_RULES_PATH?: string;

  @IsOptional()
  @IsBooleanString()
  ADMISSION_RULES_WATCH?: string;

  @IsOptional()
  @IsInt()
  @Min(0)
  @Max(1048576)
  ADMISSION_MAX_BODY_SAMPLE_BYTES?: number;

  @IsOptional()
  @IsNumber()
  @Min(0)
  @Max(1)
  CIRCUIT_BREAKER_DEFAULT_FAILURE_RATE?: number;

  @IsOptional()
  @IsIn(['count', 'time'])
  CIRCUIT_BREAKER_DEFAULT_WINDOW_TYPE?: string;

  @IsOptional()
  @IsInt()
  @Min(1)
  CIRCUIT_BREAKER_DEFAULT_WINDOW_SIZE?: number;

  @IsOptional()
  @IsInt()
  @Min(1)
  CIRCUIT_BREAKER_DEFAULT_MINIMUM_CALLS?: number;

  @IsOptional()
  @IsInt()
  @Min(1)
  CIRCUIT_BREAKER_DEFAULT_WAIT_OPEN_MS?: number;

  @IsOptional()
  @IsInt()
  @Min(1)
  CIRCUIT_BREAKER_DEFAULT_HALF_OPEN_CALLS?: number;

  @IsOptional()
  @IsInt()
  @Min(1000)
  CIRCUIT_BREAKER_IDLE_EVICT_MS?: number;

  @IsOptional()
  @IsInt()
  @Min(1)
  CIRCUIT_BREAKER_MAX_TRACKED?: number;
}

/**
 * `ConfigModule.forRoot({ validate })` hook. Rejects start-up with every
 * problem listed rather than the first one.
 */
export function validateEnvironment(
  config: Record<string, unknown>,
): Record<string, unknown> {
  const validated = plainToInstance(EnvironmentVariables, config, {
    enableImplicitConversion: true,
  });
  const errors = validateSync(validated, { skipMissingProperties: false });

  if (errors.length > 0) {
    const messages = errors.flatMap((error) =>
      Object.values(error.constraints ?? {}),
    );
    throw new Error(`Invalid environment: ${messages.join('; ')}`);
  }

  return config;
}
