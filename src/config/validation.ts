import { plainToInstance } from 'class-transformer'
import {
  IsBooleanString,
  IsEnum,
  IsIn,
  IsInt,
  IsOptional,
  IsPositive,
  IsString,
  IsUrl,
  validateSync,
} from 'class-validator'

/**
 * Environment Variables Validation Schema
 *
 * Validates that all environment variables are correctly typed.
 * The application will fail to start if validation fails.
 */

enum Environment {
  Development = 'development',
  Production = 'production',
  Test = 'test',
  Staging = 'staging',
}

class EnvironmentVariables {
  // Service Info
  @IsString()
  @IsOptional()
  SERVICE_NAME?: string

  // Application
  @IsEnum(Environment)
  @IsOptional()
  NODE_ENV?: Environment = Environment.Development

  @IsInt()
  @IsPositive()
  @IsOptional()
  PORT?: number = 8082

  @IsString()
  @IsOptional()
  API_PREFIX?: string

  // Database
  @IsString()
  @IsOptional()
  DATABASE_URL?: string

  @IsBooleanString()
  @IsOptional()
  DATABASE_ENABLED?: string

  @IsBooleanString()
  @IsOptional()
  DATABASE_MIGRATE?: string

  @IsInt()
  @IsPositive()
  @IsOptional()
  DATABASE_POOL_MAX?: number

  // Collaborators
  @IsUrl({ require_tld: false })
  @IsOptional()
  USER_SERVICE_URL?: string

  @IsUrl({ require_tld: false })
  @IsOptional()
  PAYMENT_SERVICE_URL?: string

  @IsInt()
  @IsPositive()
  @IsOptional()
  HTTP_TIMEOUT_MS?: number

  // Features
  @IsBooleanString()
  @IsOptional()
  ENABLE_USER_DIRECTORY?: string

  // Metrics
  @IsBooleanString()
  @IsOptional()
  METRICS_ENABLED?: string

  // CORS
  @IsString()
  @IsOptional()
  CORS_ORIGIN?: string

  // Logging
  @IsIn(['error', 'warn', 'info', 'debug', 'verbose'])
  @IsOptional()
  LOG_LEVEL?: string = 'info'

  @IsIn(['json', 'pretty'])
  @IsOptional()
  LOG_FORMAT?: string

  @IsBooleanString()
  @IsOptional()
  ENABLE_CONSOLE_LOGS?: string
}

/**
 * Validate environment variables
 *
 * @param config - Raw environment variables
 * @returns Validated configuration
 */
export function validate(config: Record<string, unknown>): EnvironmentVariables {
  const validatedConfig = plainToInstance(EnvironmentVariables, config, {
    enableImplicitConversion: true,
  })

  const errors = validateSync(validatedConfig, {
    skipMissingProperties: false,
  })

  if (errors.length > 0) {
    throw new Error(errors.toString())
  }

  return validatedConfig
}
