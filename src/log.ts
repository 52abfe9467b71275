export interface Logger {
  debug(message: string, details?: Record<string, unknown>): void;
  info(message: string, details?: Record<string, unknown>): void;
  warn(message: string, details?: Record<string, unknown>): void;
  error(message: string, details?: Record<string, unknown>): void;
}

type Level = keyof Logger;

const SINKS: Record<Level, (...args: unknown[]) => void> = {
  debug: (...args) => console.log(...args),
  info: (...args) => console.log(...args),
  warn: (...args) => console.warn(...args),
  error: (...args) => console.error(...args)
};

export function createLogger(scope: string, debugEnabled: boolean = false): Logger {
  function write(level: Level, message: string, details?: Record<string, unknown>): void {
    if (level === 'debug' && !debugEnabled) {
      return;
    }

    const line = `[${scope}] ${message}`;
    if (details) {
      SINKS[level](line, details);
      return;
    }

    SINKS[level](line);
  }

  return {
    debug: (message, details) => write('debug', message, details),
    info: (message, details) => write('info', message, details),
    warn: (message, details) => write('warn', message, details),
    error: (message, details) => write('error', message, details)
  };
}
