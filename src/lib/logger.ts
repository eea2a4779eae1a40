import { config, type LogLevel } from './config';

export type LogContext = Record<string, unknown>;

export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
}

type EmittingLevel = Exclude<LogLevel, 'silent'>;

const LEVEL_RANKS: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

const write = (level: EmittingLevel, line: string, context?: LogContext) => {
  if (context && Object.keys(context).length > 0) {
    console[level](line, context);
    return;
  }
  console[level](line);
};

export const createLogger = (scope: string, level: LogLevel = config.logLevel): Logger => {
  const threshold = LEVEL_RANKS[level];
  const emit = (messageLevel: EmittingLevel) => (message: string, context?: LogContext) => {
    if (LEVEL_RANKS[messageLevel] < threshold) {
      return;
    }
    write(messageLevel, `[dor:${scope}] ${message}`, context);
  };

  return {
    debug: emit('debug'),
    info: emit('info'),
    warn: emit('warn'),
    error: emit('error'),
  };
};
