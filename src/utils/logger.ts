import { loadDebugConfig, LogLevel, type DebugConfig } from '../config/debug.js';

let debugConfig: DebugConfig | undefined;

// Read on first use, after the entry point has applied .env
function settings(): DebugConfig {
  const loaded = debugConfig ?? loadDebugConfig();
  debugConfig = loaded;
  return loaded;
}

export type DebugCategory = 'lexer' | 'parser' | 'metrics' | 'entities' | 'compiler';

function categoryEnabled(category: DebugCategory): boolean {
  const debugConfig = settings();
  if (!debugConfig.enabled) {
    return false;
  }

  switch (category) {
    case 'lexer':
      return debugConfig.logLexer;
    case 'parser':
      return debugConfig.logParser;
    case 'metrics':
      return debugConfig.logMetrics;
    case 'entities':
      return debugConfig.logEntities;
    case 'compiler':
      return debugConfig.logCompiler;
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
  return LOG_LEVEL_PRIORITY[level] >= LOG_LEVEL_PRIORITY[settings().logLevel];
}

function errorReplacer(_key: string, val: unknown): unknown {
  if (val instanceof Error) {
    return { name: val.name, message: val.message, stack: val.stack };
  }
  return val;
}

function describeFailure(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

const serialize = (value: unknown) => {
  try {
    return JSON.stringify(value, errorReplacer, 2);
  } catch (error) {
    return `[unserializable: ${describeFailure(error)}]`;
  }
};

function formatPretty(entry: LogEntry): string {
  const { timestamp, level, category, message, ...rest } = entry;
  const categoryStr = category ? `[query:${category}]` : '[query]';
  const levelStr = `[${level.toUpperCase()}]`;

  const base = `${timestamp} ${levelStr} ${categoryStr} ${message}`;

  if (Object.keys(rest).length === 0) {
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
      _serializationError: `Failed to serialize: ${describeFailure(error)}`,
    });
  }
}

// stdout belongs to the MCP stdio transport, so every log line goes to stderr
function emit(entry: LogEntry): void {
  const output = settings().logFormat === 'json' ? formatJson(entry) : formatPretty(entry);
  console.error(output);
}

function serializeError(error: Error): Record<string, unknown> {
  const errorEntry: Record<string, unknown> = {
    name: error.name,
    message: error.message,
    stack: error.stack,
  };
  if (error.cause) {
    errorEntry.cause = error.cause;
  }
  return errorEntry;
}

export interface Timer {
  end(payload?: Record<string, unknown>): number;
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

    if (payload === undefined) {
      return entry;
    }

    if (payload instanceof Error) {
      entry.error = serializeError(payload);
    } else if (typeof payload === 'object' && payload !== null && !Array.isArray(payload)) {
      for (const [key, val] of Object.entries(payload)) {
        entry[key] = val instanceof Error ? serializeError(val) : val;
      }
    } else {
      entry.data = payload;
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

  metric(metricName: string, payload: unknown): void {
    if (!settings().enableRequestTiming || !shouldLog(LogLevel.INFO)) {
      return;
    }

    const entry = this.createEntry(LogLevel.INFO, undefined, metricName, payload);
    entry.type = 'metric';
    emit(entry);
  }

  /**
   * Start a timing span. `end()` emits a metric entry with `durationMs` merged into
   * the given payload and returns the elapsed milliseconds.
   */
  startTimer(spanName: string, metadata?: Record<string, unknown>): Timer {
    const start = Date.now();
    return {
      end: (payload?: Record<string, unknown>) => {
        const durationMs = Date.now() - start;
        this.metric(spanName, { ...metadata, ...payload, durationMs });
        return durationMs;
      },
    };
  }
}

export const logger = new Logger();

export function debugLog(category: DebugCategory, message: string, payload?: unknown) {
  logger.debug(category, message, payload);
}
