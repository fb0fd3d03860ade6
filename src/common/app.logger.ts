import { ConsoleLogger, LogLevel } from '@nestjs/common';
import { createWriteStream, mkdirSync, type WriteStream } from 'node:fs';
import { join } from 'node:path';
import { LOG_LEVELS, type LogLevelName } from '../config/env.validation';

const LEVEL_ORDER: LogLevel[] = ['fatal', 'error', 'warn', 'log', 'debug', 'verbose'];

export function resolveLogLevels(level: string | undefined): LogLevel[] {
  const wanted = (level ?? 'info').toLowerCase();
  const name: LogLevelName = LOG_LEVELS.find((l) => l === wanted) ?? 'info';
  const threshold: LogLevel = name === 'info' ? 'log' : name;
  const cut = LEVEL_ORDER.indexOf(threshold);
  return cut === -1 ? LEVEL_ORDER.slice(0, 4) : LEVEL_ORDER.slice(0, cut + 1);
}

export interface AppLoggerOptions {
  level?: string;
  logDir?: string;
  fileName?: string;
}

/**
 * Console logger that mirrors every line into `<logDir>/backend.log`.
 */
export class AppLogger extends ConsoleLogger {
  private readonly file: WriteStream | null;

  constructor(options: AppLoggerOptions = {}) {
    super('TravelAdvisor', { logLevels: resolveLogLevels(options.level) });
    this.file = options.logDir
      ? this.openFile(options.logDir, options.fileName ?? 'backend.log')
      : null;
  }

  protected printMessages(
    messages: unknown[],
    context = '',
    logLevel: LogLevel = 'log',
    writeStreamType?: 'stdout' | 'stderr',
  ): void {
    super.printMessages(messages, context, logLevel, writeStreamType);
    if (!this.file) return;

    const timestamp = new Date().toISOString();
    for (const message of messages) {
      const text =
        typeof message === 'string' ? message : JSON.stringify(message);
      this.file.write(
        `${timestamp} - ${context || 'app'} - ${logLevel.toUpperCase()} - ${text}\n`,
      );
    }
  }

  close(): void {
    this.file?.end();
  }

  private openFile(logDir: string, fileName: string): WriteStream | null {
    try {
      mkdirSync(logDir, { recursive: true });
    } catch (error) {
      super.warn(`Log directory ${logDir} unavailable: ${String(error)}`);
      return null;
    }
    const stream = createWriteStream(join(logDir, fileName), { flags: 'a' });
    stream.on('error', (error) => {
      super.error(`Log file write failed: ${error.message}`);
    });
    return stream;
  }
}
