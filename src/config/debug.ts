export enum LogLevel {
  DEBUG = 'debug',
  INFO = 'info',
  WARN = 'warn',
  ERROR = 'error',
}

export type LogFormat = 'json' | 'pretty';

export interface DebugConfig {
  enabled: boolean;
  logQuery: boolean; // compile, cache and evaluation diagnostics
  logStore: boolean;
  logServer: boolean;
  logLevel: LogLevel;
  logFormat: LogFormat;
  slowQueryThresholdMs: number;
}

const toBool = (value: string | undefined, defaultValue: boolean) => {
  if (value === undefined || value === '') {
    return defaultValue;
  }

  return value.trim().toLowerCase() === 'true';
};

const toLogLevel = (value: string | undefined, defaultValue: LogLevel): LogLevel => {
  if (!value) {
    return defaultValue;
  }

  const normalized = value.trim().toLowerCase();
  switch (normalized) {
    case 'debug':
      return LogLevel.DEBUG;
    case 'info':
      return LogLevel.INFO;
    case 'warn':
      return LogLevel.WARN;
    case 'error':
      return LogLevel.ERROR;
    default:
      return defaultValue;
  }
};

const toLogFormat = (value: string | undefined, defaultValue: LogFormat): LogFormat => {
  if (!value) {
    return defaultValue;
  }

  const normalized = value.trim().toLowerCase();
  return normalized === 'json' ? 'json' : defaultValue;
};

export const toNumber = (value: string | undefined, defaultValue: number): number => {
  if (!value) {
    return defaultValue;
  }

  const parsed = parseInt(value, 10);
  return isNaN(parsed) ? defaultValue : parsed;
};

export function loadDebugConfig(): DebugConfig {
  const enabled = toBool(process.env.QUERY_DEBUG_MODE, false);

  // Level and format apply whether or not debug categories are on
  const logLevel = toLogLevel(process.env.QUERY_LOG_LEVEL, LogLevel.INFO);
  const logFormat = toLogFormat(process.env.QUERY_LOG_FORMAT, 'pretty');
  const slowQueryThresholdMs = toNumber(process.env.QUERY_SLOW_QUERY_THRESHOLD_MS, 100);

  if (!enabled) {
    return {
      enabled: false,
      logQuery: false,
      logStore: false,
      logServer: false,
      logLevel,
      logFormat,
      slowQueryThresholdMs,
    };
  }

  return {
    enabled: true,
    logQuery: toBool(process.env.QUERY_DEBUG_QUERY, true),
    logStore: toBool(process.env.QUERY_DEBUG_STORE, true),
    logServer: toBool(process.env.QUERY_DEBUG_SERVER, true),
    logLevel,
    logFormat,
    slowQueryThresholdMs,
  };
}
