// Structured stderr logger — `[Scope:LEVEL] message {json}`
// Threshold comes from BROKER_LOG_LEVEL unless the caller passes one.

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export interface Logger {
  debug(message: string, data?: Record<string, unknown>): void;
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, data?: Record<string, unknown>): void;
  child(scope: string): Logger;
}

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && value in LEVEL_ORDER;
}

export function resolveLogLevel(value = process.env.BROKER_LOG_LEVEL): LogLevel {
  const normalized = value?.toLowerCase();
  return isLogLevel(normalized) ? normalized : 'info';
}

export function createLogger(scope: string, level: LogLevel = resolveLogLevel()): Logger {
  const threshold = LEVEL_ORDER[level];

  function log(msgLevel: Exclude<LogLevel, 'silent'>, message: string, data?: Record<string, unknown>): void {
    if (LEVEL_ORDER[msgLevel] < threshold) return;
    const prefix = `[${scope}:${msgLevel.toUpperCase()}]`;
    if (data) {
      console.error(`${prefix} ${message}`, JSON.stringify(data));
    } else {
      console.error(`${prefix} ${message}`);
    }
  }

  return {
    debug: (message, data) => log('debug', message, data),
    info: (message, data) => log('info', message, data),
    warn: (message, data) => log('warn', message, data),
    error: (message, data) => log('error', message, data),
    child: (childScope) => createLogger(`${scope}.${childScope}`, level),
  };
}

/** Logger that drops everything; the default for library callers that pass none in tests. */
export const silentLogger: Logger = createLogger('silent', 'silent');
