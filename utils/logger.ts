// Basic leveled logger. Everything goes to stderr so that command output on
// stdout can be piped.

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error';

const getTimestamp = (): string => {
  return new Date().toISOString();
};

const LEVEL_WEIGHTS: Record<LogLevel, number> = {
  trace: 1,
  debug: 2,
  info: 3,
  warn: 4,
  error: 5,
};

function isLogLevel(value: string): value is LogLevel {
  return value in LEVEL_WEIGHTS;
}

// Default to 'error' in test environment, 'warn' for interactive use
const getDefaultLogLevel = (): LogLevel => {
  if (process.env.NODE_ENV === 'test') {
    return 'error';
  }
  return 'warn';
};

const resolveLevel = (raw: string | undefined): LogLevel => {
  const candidate = raw?.toLowerCase();
  return candidate && isLogLevel(candidate) ? candidate : getDefaultLogLevel();
};

let currentLevel: LogLevel = resolveLevel(process.env.LOG_LEVEL);

const enabled = (level: LogLevel): boolean => LEVEL_WEIGHTS[currentLevel] <= LEVEL_WEIGHTS[level];

export const logger = {
  trace: (...args: unknown[]): void => {
    if (enabled('trace')) {
      console.error(`[${getTimestamp()}] [TRACE]`, ...args);
    }
  },
  debug: (...args: unknown[]): void => {
    if (enabled('debug')) {
      console.error(`[${getTimestamp()}] [DEBUG]`, ...args);
    }
  },
  info: (...args: unknown[]): void => {
    if (enabled('info')) {
      console.error(`[${getTimestamp()}] [INFO]`, ...args);
    }
  },
  warn: (...args: unknown[]): void => {
    if (enabled('warn')) {
      console.error(`[${getTimestamp()}] [WARN]`, ...args);
    }
  },
  error: (...args: unknown[]): void => {
    if (enabled('error')) {
      console.error(`[${getTimestamp()}] [ERROR]`, ...args);
    }
  },
};

/**
 * Changes the active level at runtime (the CLI's --verbose flag).
 * Unknown names are ignored.
 */
export function setLogLevel(level: string): void {
  const candidate = level.toLowerCase();
  if (isLogLevel(candidate)) {
    currentLevel = candidate;
  }
}
