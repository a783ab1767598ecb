const isProd = process.env.NODE_ENV === 'production';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

const SECRET_KEYS = new Set(['password', 'apikey', 'token', 'authorization', 'cookie']);

interface LogEntry {
  level: LogLevel;
  message: string;
  source: string;
  timestamp: string;
  [key: string]: unknown;
}

function isLogLevel(value: string | undefined): value is LogLevel {
  return value === 'debug' || value === 'info' || value === 'warn' || value === 'error';
}

const envLevel = process.env['LOG_LEVEL'];
let threshold: LogLevel = isLogLevel(envLevel) ? envLevel : 'info';

export function setLogLevel(level: LogLevel): void {
  threshold = level;
}

export function redact(data: Record<string, unknown>): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(data)) {
    out[key] = SECRET_KEYS.has(key.toLowerCase()) && value ? '[redacted]' : value;
  }
  return out;
}

export function createLogger(source: string) {
  const log = (level: LogLevel, message: string, data?: Record<string, unknown>) => {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[threshold]) return;

    const safe = data ? redact(data) : undefined;
    const entry: LogEntry = {
      level,
      message,
      source,
      timestamp: new Date().toISOString(),
      ...safe,
    };

    const consoleMethod = level === 'debug' ? 'log' : level;

    if (isProd) {
      console[consoleMethod](JSON.stringify(entry));
    } else {
      const dataStr = safe ? ` ${JSON.stringify(safe)}` : '';
      console[consoleMethod](`${entry.timestamp} ${level} [${source}] ${message}${dataStr}`);
    }
  };

  return {
    debug: (message: string, data?: Record<string, unknown>) => log('debug', message, data),
    error: (message: string, data?: Record<string, unknown>) => log('error', message, data),
    info: (message: string, data?: Record<string, unknown>) => log('info', message, data),
    warn: (message: string, data?: Record<string, unknown>) => log('warn', message, data),
  };
}
