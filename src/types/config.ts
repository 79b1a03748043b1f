export type LogLevel = 'error' | 'warn' | 'info';

export interface CliConfiguration {
  defaultModel: string;
  timeoutMs: number;
  language: string;
  logLevel: LogLevel;
  promptFile?: string;
}
