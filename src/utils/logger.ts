export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export type Logger = {
  debug: (...args: unknown[]) => void;
  info: (...args: unknown[]) => void;
  warn: (...args: unknown[]) => void;
  error: (...args: unknown[]) => void;
};

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export const isLogLevel = (value: unknown): value is LogLevel =>
  typeof value === 'string' && value in LEVEL_ORDER;

export const parseLogLevel = (raw: string | undefined, fallback: LogLevel = 'info'): LogLevel => {
  const v = String(raw ?? '')
    .trim()
    .toLowerCase();
  return isLogLevel(v) ? v : fallback;
};

let activeLevel: LogLevel = parseLogLevel(process.env.LOG_LEVEL);

export const setLogLevel = (level: LogLevel) => {
  activeLevel = level;
};

export const getLogLevel = () => activeLevel;

const enabled = (level: Exclude<LogLevel, 'silent'>) => LEVEL_ORDER[level] >= LEVEL_ORDER[activeLevel];

/**
 * Console logger that prefixes every line with `[tag]`.
 * The level is process-wide so tests and the factory can silence everything at once.
 */
export const createLogger = (tag: string): Logger => {
  const prefix = `[${tag}]`;
  return {
    debug: (...args) => {
      if (enabled('debug')) console.debug(prefix, ...args);
    },
    info: (...args) => {
      if (enabled('info')) console.info(prefix, ...args);
    },
    warn: (...args) => {
      if (enabled('warn')) console.warn(prefix, ...args);
    },
    error: (...args) => {
      if (enabled('error')) console.error(prefix, ...args);
    },
  };
};
