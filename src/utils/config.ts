import { DEFAULT_MODEL } from '../constants/models';
import type { CliConfiguration, LogLevel } from '../types/config';

export type Environment = Readonly<Record<string, string | undefined>>;

const DEFAULT_TIMEOUT_MS = 30000;

function readString(env: Environment, name: string): string | undefined {
  return env[name]?.trim() || undefined;
}

function readPositiveInteger(env: Environment, name: string, fallback: number): number {
  const raw = readString(env, name);

  if (!raw) {
    return fallback;
  }

  const parsed = Number.parseInt(raw, 10);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
}

function readLogLevel(env: Environment): LogLevel {
  const raw = readString(env, 'TRANSOME_LOG_LEVEL')?.toLowerCase();

  if (raw === 'error' || raw === 'warn' || raw === 'info') {
    return raw;
  }

  return raw === 'debug' ? 'info' : 'warn';
}

export function getCliConfiguration(env: Environment = process.env): CliConfiguration {
  return {
    defaultModel: readString(env, 'TRANSOME_MODEL') ?? DEFAULT_MODEL,
    timeoutMs: readPositiveInteger(env, 'TRANSOME_TIMEOUT_MS', DEFAULT_TIMEOUT_MS),
    language:
      readString(env, 'TRANSOME_LANG') ?? readString(env, 'LC_ALL') ?? readString(env, 'LANG') ?? 'en',
    logLevel: readLogLevel(env),
    promptFile: readString(env, 'TRANSOME_PROMPT_FILE'),
  };
}
