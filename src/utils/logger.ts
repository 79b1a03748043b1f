import type { LogLevel } from '../types/config';

const LEVEL_WEIGHT: Record<LogLevel, number> = {
  error: 0,
  warn: 1,
  info: 2,
};

export interface LogSink {
  write(chunk: string): unknown;
}

export class CliLogger {
  constructor(
    private readonly sink: LogSink = process.stderr,
    private readonly level: LogLevel = 'warn',
  ) {}

  info(message: string): void {
    this.write('info', message);
  }

  warn(message: string): void {
    this.write('warn', message);
  }

  error(message: string, error?: unknown): void {
    const details = error instanceof Error ? `\n${error.name}: ${error.message}\n${error.stack ?? ''}` : '';
    this.write('error', `${message}${details}`);
  }

  event(name: string, data: Record<string, unknown>): void {
    if (!this.isEnabled('info')) {
      return;
    }

    this.sink.write(`${this.formatEvent(name, data)}\n`);
  }

  isEnabled(level: LogLevel): boolean {
    return LEVEL_WEIGHT[level] <= LEVEL_WEIGHT[this.level];
  }

  private write(level: LogLevel, message: string): void {
    if (!this.isEnabled(level)) {
      return;
    }

    this.sink.write(`${this.format(level, message)}\n`);
  }

  private format(level: LogLevel, message: string): string {
    const timestamp = new Date().toISOString();
    return `[${level.toUpperCase()} - ${timestamp}] ${message}`;
  }

  private formatEvent(name: string, data: Record<string, unknown>): string {
    const timestamp = new Date().toISOString();
    return `[EVENT - ${timestamp}] ${name} ${this.safeStringify(data)}`;
  }

  private safeStringify(data: Record<string, unknown>): string {
    try {
      return JSON.stringify(data, undefined, 0);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      return JSON.stringify({ serializationError: message });
    }
  }
}
