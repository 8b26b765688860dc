//scoped logger: "[scope] message" lines on stderr, filtered by a process-wide level
//stdout stays free for callers that pipe structured output

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40, silent: 100 };

let currentLevel: LogLevel = 'info';

export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

export function getLogLevel(): LogLevel {
  return currentLevel;
}

export interface Logger {
  debug(message: string, ...details: unknown[]): void;
  info(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
  error(message: string, ...details: unknown[]): void;
}

const enabled = (level: LogLevel) => LEVEL_ORDER[level] >= LEVEL_ORDER[currentLevel];

export function createLogger(scope: string): Logger {
  const prefix = `[${scope}]`;
  return {
    debug: (message, ...details) => { if (enabled('debug')) console.error(prefix, message, ...details); },
    info: (message, ...details) => { if (enabled('info')) console.error(prefix, message, ...details); },
    warn: (message, ...details) => { if (enabled('warn')) console.warn(prefix, message, ...details); },
    error: (message, ...details) => { if (enabled('error')) console.error(prefix, message, ...details); },
  };
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
