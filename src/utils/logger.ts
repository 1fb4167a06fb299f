import { loadDebugConfig, LogLevel } from '../config/debug.js';

const debugConfig = loadDebugConfig();

export type DebugCategory = 'query' | 'store' | 'server';

function categoryEnabled(category: DebugCategory): boolean {
  if (!debugConfig.enabled) {
    return false;
  }

  switch (category) {
    case 'query':
      return debugConfig.logQuery;
    case 'store':
      return debugConfig.logStore;
    case 'server':
      return debugConfig.logServer;
    default:
      return false;
  }
}

interface LogEntry {
  timestamp: string;
  level: string;
  category?: string;
  message: string;
  [key: string]: unknown;
}

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  [LogLevel.DEBUG]: 0,
  [LogLevel.INFO]: 1,
  [LogLevel.WARN]: 2,
  [LogLevel.ERROR]: 3,
};

function shouldLog(level: LogLevel): boolean {
  return LOG_LEVEL_PRIORITY[level] >= LOG_LEVEL_PRIORITY[debugConfig.logLevel];
}

function errorReplacer(_key: string, val: unknown): unknown {
  if (val instanceof Error) {
    return { name: val.name, message: val.message, stack: val.stack };
  }
  return val;
}

const serialize = (value: unknown) => {
  try {
    return JSON.stringify(value, errorReplacer, 2);
  } catch (error) {
    return `[unserializable: ${error instanceof Error ? error.message : String(error)}]`;
  }
};

function formatPretty(entry: LogEntry): string {
  const { timestamp, level, category, message, ...rest } = entry;
  const categoryStr = category ? `[record-query:${category}]` : '[record-query]';
  const levelStr = `[${level.toUpperCase()}]`;

  const base = `${timestamp} ${levelStr} ${categoryStr} ${message}`;

  const hasAdditionalData = Object.keys(rest).length > 0;
  if (!hasAdditionalData) {
    return base;
  }

  return `${base}\n${serialize(rest)}`;
}

function formatJson(entry: LogEntry): string {
  try {
    return JSON.stringify(entry, errorReplacer);
  } catch (error) {
    return JSON.stringify({
      timestamp: entry.timestamp,
      level: entry.level,
      message: entry.message,
      _serializationError: `Failed to serialize: ${error instanceof Error ? error.message : String(error)}`,
    });
  }
}

// stdout carries the MCP protocol, so every log line goes to stderr
function emit(entry: LogEntry): void {
  const output = debugConfig.logFormat === 'json' ? formatJson(entry) : formatPretty(entry);
  console.error(output);
}

function errorFields(error: Error): Record<string, unknown> {
  const fields: Record<string, unknown> = {
    name: error.name,
    message: error.message,
    stack: error.stack,
  };
  if (error.cause) {
    fields.cause = error.cause;
  }
  return fields;
}

class Logger {
  private createEntry(
    level: LogLevel,
    category: string | undefined,
    message: string,
    payload?: unknown
  ): LogEntry {
    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
    };

    if (category) {
      entry.category = category;
    }

    if (payload !== undefined) {
      if (payload instanceof Error) {
        entry.error = errorFields(payload);
      } else if (typeof payload === 'object' && payload !== null && !Array.isArray(payload)) {
        for (const [key, val] of Object.entries(payload)) {
          entry[key] = val instanceof Error ? errorFields(val) : val;
        }
      } else {
        entry.data = payload;
      }
    }

    return entry;
  }

  debug(category: DebugCategory, message: string, payload?: unknown): void {
    if (!categoryEnabled(category) || !shouldLog(LogLevel.DEBUG)) {
      return;
    }

    emit(this.createEntry(LogLevel.DEBUG, category, message, payload));
  }

  info(message: string, payload?: unknown): void {
    if (!shouldLog(LogLevel.INFO)) {
      return;
    }

    emit(this.createEntry(LogLevel.INFO, undefined, message, payload));
  }

  warn(message: string, payload?: unknown): void {
    if (!shouldLog(LogLevel.WARN)) {
      return;
    }

    emit(this.createEntry(LogLevel.WARN, undefined, message, payload));
  }

  error(message: string, payload?: unknown): void {
    if (!shouldLog(LogLevel.ERROR)) {
      return;
    }

    emit(this.createEntry(LogLevel.ERROR, undefined, message, payload));
  }

  metric(metricName: string, payload: Record<string, unknown>): void {
    if (!shouldLog(LogLevel.INFO)) {
      return;
    }

    const entry = this.createEntry(LogLevel.INFO, undefined, metricName, payload);
    entry.type = 'metric';
    emit(entry);
  }

  /**
   * Time a synchronous span. Spans slower than the configured threshold are
   * reported as warnings; failures are logged and rethrown.
   */
  withTimer<T>(spanName: string, metadata: Record<string, unknown>, fn: () => T): T {
    const start = Date.now();

    try {
      const result = fn();
      const durationMs = Date.now() - start;
      if (durationMs >= debugConfig.slowQueryThresholdMs) {
        this.warn(`${spanName} slow`, { ...metadata, durationMs });
      } else {
        this.debug('query', `${spanName} done`, { ...metadata, durationMs });
      }
      return result;
    } catch (error) {
      this.debug('query', `${spanName} failed`, {
        ...metadata,
        durationMs: Date.now() - start,
        error,
      });
      throw error;
    }
  }
}

export const logger = new Logger();
