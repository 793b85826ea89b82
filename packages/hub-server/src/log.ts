export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVELS: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

let threshold: number = LEVELS.info;

export function setLogLevel(level: string): void {
  if (isLogLevel(level)) threshold = LEVELS[level];
}

function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LEVELS, value);
}

export interface Logger {
  debug(message: string, ...extra: unknown[]): void;
  info(message: string, ...extra: unknown[]): void;
  warn(message: string, ...extra: unknown[]): void;
  error(message: string, ...extra: unknown[]): void;
}

export function createLogger(scope: string): Logger {
  const write = (level: LogLevel, message: string, extra: unknown[]) => {
    if (LEVELS[level] < threshold) return;
    const line = `[freigent-hub] ${level.toUpperCase()} ${scope}: ${message}`;
    if (level === 'error') console.error(line, ...extra);
    else if (level === 'warn') console.warn(line, ...extra);
    else console.log(line, ...extra);
  };

  return {
    debug: (message, ...extra) => write('debug', message, extra),
    info: (message, ...extra) => write('info', message, extra),
    warn: (message, ...extra) => write('warn', message, extra),
    error: (message, ...extra) => write('error', message, extra),
  };
}
