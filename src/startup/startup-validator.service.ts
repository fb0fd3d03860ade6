import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { mkdir, unlink, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { DatabaseService } from '../database/database.service';
import { OllamaService } from '../ollama/ollama.service';
import type { ValidationReport } from './startup.types';

const OPTIONAL_VARS = [
  'OLLAMA_BASE_URL',
  'OLLAMA_LLM_MODEL',
  'QDRANT_URL',
  'LOG_LEVEL',
  'LOG_DIR',
  'CORS_ORIGINS',
] as const;

const isTimeout = (error: unknown) =>
  error instanceof Error && error.name === 'TimeoutError';

/**
 * Pre-flight checks run before the server accepts traffic. Errors block
 * startup; warnings are logged and tolerated.
 */
@Injectable()
export class StartupValidatorService {
  private readonly logger = new Logger(StartupValidatorService.name);
  private errors: string[] = [];
  private warnings: string[] = [];

  constructor(
    private readonly config: ConfigService,
    private readonly database: DatabaseService,
    private readonly ollama: OllamaService,
  ) {}

  async run(): Promise<ValidationReport> {
    this.errors = [];
    this.warnings = [];
    this.logger.log('Starting application validation...');

    this.checkEnvironment();
    await this.checkDatabase();
    await this.checkLlm();
    await this.checkExternalApis();
    await this.checkLogDirectory();

    const report: ValidationReport = {
      ok: this.errors.length === 0,
      errors: [...this.errors],
      warnings: [...this.warnings],
    };

    if (report.ok) {
      this.logger.log(
        `Validation passed with ${report.warnings.length} warning(s)`,
      );
    } else {
      this.logger.error(
        `Validation failed: ${report.errors.length} error(s), ${report.warnings.length} warning(s)`,
      );
    }
    return report;
  }

  private checkEnvironment(): void {
    if (!this.config.get<string>('DATABASE_URL')) {
      this.error('Missing required environment variable: DATABASE_URL');
    } else {
      this.ok('Environment variable DATABASE_URL is set');
    }

    if (!this.config.get<string>('LLM_API_KEY')) {
      this.warn('LLM_API_KEY is not set; LLM requests are sent without a key');
    }

    for (const name of OPTIONAL_VARS) {
      const value = this.config.get<string | number>(name);
      this.logger.log(`${name}: ${value === undefined ? 'default' : String(value)}`);
    }
  }

  private async checkDatabase(): Promise<void> {
    try {
      await this.database.ping(1);
      this.ok('Database connection successful');
    } catch (error) {
      this.error(`Database connection failed: ${(error as Error).message}`);
    }
  }

  private async checkLlm(): Promise<void> {
    try {
      const status = await this.ollama.probe();
      if (status === 200) {
        this.ok('LLM API connection successful');
      } else if (status === 401) {
        this.error('LLM API key is invalid');
      } else if (status === 429) {
        this.warn('LLM API rate limit reached (this may be temporary)');
      } else {
        this.error(`LLM API returned status ${status}`);
      }
    } catch (error) {
      if (isTimeout(error)) {
        this.warn('LLM API timeout (service may be slow)');
      } else {
        this.error(`LLM API connection failed: ${(error as Error).message}`);
      }
    }
  }

  private async checkExternalApis(): Promise<void> {
    const timeoutMs = Number(this.config.get('HTTP_TIMEOUT_MS') ?? 10000);
    const weatherUrl =
      this.config.get<string>('WEATHER_API_URL') ??
      'https://api.open-meteo.com/v1/forecast';
    const geocodingUrl =
      this.config.get<string>('GEOCODING_API_URL') ??
      'https://nominatim.openstreetmap.org/search';

    await this.checkReachable(
      'Weather API',
      `${weatherUrl}?latitude=0&longitude=0&current_weather=true`,
      timeoutMs,
    );
    await this.checkReachable(
      'Geocoding API',
      `${geocodingUrl}?q=London&format=json&limit=1`,
      timeoutMs,
    );
  }

  private async checkReachable(label: string, url: string, timeoutMs: number): Promise<void> {
    try {
      const res = await fetch(url, {
        headers: { 'User-Agent': 'travel-advisor/1.0' },
        signal: AbortSignal.timeout(timeoutMs),
      });
      if (res.ok) {
        this.ok(`${label} accessible`);
      } else {
        this.warn(`${label} returned status ${res.status}`);
      }
    } catch (error) {
      this.warn(
        isTimeout(error)
          ? `${label} timeout`
          : `${label} connection failed: ${(error as Error).message}`,
      );
    }
  }

  private async checkLogDirectory(): Promise<void> {
    const dir = this.config.get<string>('LOG_DIR') ?? 'logs';
    const probe = join(dir, '.write-check');
    try {
      await mkdir(dir, { recursive: true });
      await writeFile(probe, 'ok');
      await unlink(probe);
      this.ok(`Log directory '${dir}' is writable`);
    } catch (error) {
      this.error(`Log directory '${dir}' is not writable: ${(error as Error).message}`);
    }
  }

  private ok(message: string): void {
    this.logger.log(`[OK] ${message}`);
  }

  private warn(message: string): void {
    this.warnings.push(message);
    this.logger.warn(`[WARNING] ${message}`);
  }

  private error(message: string): void {
    this.errors.push(message);
    this.logger.error(`[ERROR] ${message}`);
  }
}
