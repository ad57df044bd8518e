export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface Logger {
  debug(message: string, data?: Record<string, unknown>): void;
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, data?: Record<string, unknown>): void;
  child(fields: Record<string, unknown>): Logger;
}

export interface LoggerOptions {
  enabled?: boolean;
  level?: LogLevel;
  fields?: Record<string, unknown>;
  clock?: () => Date;
}

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

export function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LEVEL_ORDER, value);
}

/**
 * Structured JSON logger writing one line per entry through the console method
 * matching the entry's level.
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  const { enabled = true, level = 'info', fields = {}, clock = () => new Date() } = options;
  const threshold = LEVEL_ORDER[level];

  const write = (entryLevel: LogLevel, message: string, data?: Record<string, unknown>) => {
    if (!enabled || LEVEL_ORDER[entryLevel] < threshold) return;
    const line = JSON.stringify({
      timestamp: clock().toISOString(),
      level: entryLevel,
      message,
      ...fields,
      ...serializeData(data),
    });
    switch (entryLevel) {
      case 'error':
        console.error(line);
        break;
      case 'warn':
        console.warn(line);
        break;
      case 'debug':
        console.debug(line);
        break;
      default:
        console.info(line);
    }
  };

  return {
    debug: (message, data) => write('debug', message, data),
    info: (message, data) => write('info', message, data),
    warn: (message, data) => write('warn', message, data),
    error: (message, data) => write('error', message, data),
    child: (extra) => createLogger({ enabled, level, clock, fields: { ...fields, ...extra } }),
  };
}

// Error instances stringify to {}; keep name and message
function serializeData(data?: Record<string, unknown>): Record<string, unknown> {
  if (!data) return {};
  const out: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(data)) {
    out[key] = value instanceof Error ? { name: value.name, message: value.message } : value;
  }
  return out;
}

export const silentLogger: Logger = createLogger({ enabled: false });
