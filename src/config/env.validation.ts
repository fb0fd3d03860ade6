import { plainToInstance } from 'class-transformer';
import {
  IsBooleanString,
  IsIn,
  IsInt,
  IsNumber,
  IsOptional,
  IsString,
  IsUrl,
  Max,
  Min,
  validateSync,
} from 'class-validator';

export const LOG_LEVELS = ['error', 'warn', 'info', 'debug', 'verbose'] as const;
export type LogLevelName = (typeof LOG_LEVELS)[number];

export const ENVIRONMENTS = ['development', 'production', 'test'] as const;

class EnvironmentVariables {
  @IsOptional()
  @IsIn(ENVIRONMENTS)
  NODE_ENV?: string;

  @IsOptional()
  @IsIn(ENVIRONMENTS)
  ENVIRONMENT?: string;

  @IsOptional()
  @IsInt()
  @Min(1)
  @Max(65535)
  PORT?: number;

  @IsOptional()
  @IsIn(LOG_LEVELS)
  LOG_LEVEL?: string;

  @IsOptional()
  @IsString()
  LOG_DIR?: string;

  @IsOptional()
  @IsInt()
  @Min(1)
  WORKERS?: number;

  // Missing values are reported by the startup validator, not here.
  @IsOptional()
  @IsString()
  DATABASE_URL?: string;

  @IsOptional()
  @IsInt()
  @Min(1)
  DB_POOL_SIZE?: number;

  @IsOptional()
  @IsInt()
  @Min(0)
  DB_POOL_OVERFLOW?: number;

  @IsOptional()
  @IsInt()
  @Min(1)
  DB_CONNECT_TIMEOUT?: number;

  @IsOptional()
  @IsInt()
  @Min(1)
  DB_MAX_LIFETIME?: number;

  @IsOptional()
  @IsUrl({ require_tld: false })
  OLLAMA_BASE_URL?: string;

  @IsOptional()
  @IsString()
  LLM_API_KEY?: string;

  @IsOptional()
  @IsString()
  OLLAMA_LLM_MODEL?: string;

  @IsOptional()
  @IsString()
  OLLAMA_EMBED_MODEL?: string;

  @IsOptional()
  @IsInt()
  @Min(1)
  LLM_TIMEOUT_MS?: number;

  @IsOptional()
  @IsNumber()
  @Min(0)
  @Max(2)
  LLM_TEMPERATURE?: number;

  @IsOptional()
  @IsUrl({ require_tld: false })
  QDRANT_URL?: string;

  @IsOptional()
  @IsString()
  QDRANT_COLLECTION?: string;

  @IsOptional()
  @IsInt()
  @Min(1)
  CHUNK_SIZE?: number;

  @IsOptional()
  @IsInt()
  @Min(0)
  CHUNK_OVERLAP?: number;

  @IsOptional()
  @IsInt()
  @Min(1)
  RAG_TOP_K?: number;

  @IsOptional()
  @IsInt()
  @Min(1)
  AGENT_MAX_ITERATIONS?: number;

  @IsOptional()
  @IsBooleanString()
  AGENT_ENABLED?: string;

  @IsOptional()
  @IsUrl({ require_tld: false })
  WEATHER_API_URL?: string;

  @IsOptional()
  @IsUrl({ require_tld: false })
  GEOCODING_API_URL?: string;

  @IsOptional()
  @IsInt()
  @Min(1)
  HTTP_TIMEOUT_MS?: number;

  @IsOptional()
  @IsInt()
  @Min(0)
  WEATHER_RETRY_DELAY_MS?: number;

  @IsOptional()
  @IsInt()
  @Min(1)
  RATE_LIMIT_WINDOW_SECONDS?: number;

  @IsOptional()
  @IsInt()
  @Min(1)
  RATE_LIMIT_CRUD?: number;

  @IsOptional()
  @IsInt()
  @Min(1)
  RATE_LIMIT_AI?: number;

  @IsOptional()
  @IsString()
  CORS_ORIGINS?: string;

  @IsOptional()
  @IsUrl({ require_tld: false })
  API_BASE_URL?: string;

  @IsOptional()
  @IsBooleanString()
  SKIP_STARTUP_VALIDATION?: string;
}

export function validate(
  config: Record<string, unknown>,
): EnvironmentVariables {
  const validated = plainToInstance(EnvironmentVariables, config, {
    enableImplicitConversion: true,
  });
  const errors = validateSync(validated, { skipMissingProperties: false });

  if (errors.length > 0) {
    const details = errors
      .map((e) => Object.values(e.constraints ?? {}).join(', '))
      .join('; ');
    throw new Error(`Invalid environment configuration: ${details}`);
  }
  return validated;
}

export function readFlag(value: unknown, fallback: boolean): boolean {
  if (value === undefined || value === null || value === '') return fallback;
  return String(value).toLowerCase() === 'true';
}
