import 'dotenv/config';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export interface AppConfig {
  defaultRadiusMeters: number;
  locationTimeoutMs: number;
  timeZone: string | null;
  logLevel: LogLevel;
}

export const DEFAULT_RADIUS_METERS = 1000;
export const DEFAULT_LOCATION_TIMEOUT_MS = 15000;

const LOG_LEVELS: LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent'];

const readPositiveNumber = (value: string | undefined, fallback: number): number => {
  if (!value) {
    return fallback;
  }
  const parsed = Number(value.trim());
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
};

const readTimeZone = (value: string | undefined): string | null => {
  const trimmed = value?.trim();
  if (!trimmed) {
    return null;
  }
  try {
    new Intl.DateTimeFormat('en-US', { timeZone: trimmed });
    return trimmed;
  } catch {
    return null;
  }
};

const readLogLevel = (value: string | undefined): LogLevel => {
  const normalized = value?.trim().toLowerCase();
  return LOG_LEVELS.find((level) => level === normalized) ?? 'info';
};

export const readConfig = (env: NodeJS.ProcessEnv = process.env): AppConfig => ({
  defaultRadiusMeters: readPositiveNumber(env.DOR_DEFAULT_RADIUS_METERS, DEFAULT_RADIUS_METERS),
  locationTimeoutMs: readPositiveNumber(env.DOR_LOCATION_TIMEOUT_MS, DEFAULT_LOCATION_TIMEOUT_MS),
  timeZone: readTimeZone(env.DOR_TIMEZONE),
  logLevel: readLogLevel(env.DOR_LOG_LEVEL),
});

export const config: AppConfig = readConfig();
