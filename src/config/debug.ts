export enum LogLevel {
  DEBUG = 'debug',
  INFO = 'info',
  WARN = 'warn',
  ERROR = 'error',
}

export type LogFormat = 'json' | 'pretty';

export interface DebugConfig {
  enabled: boolean;
  logLexer: boolean;
  logParser: boolean;
  logMetrics: boolean;
  logEntities: boolean;
  logCompiler: boolean;
  logLevel: LogLevel;
  logFormat: LogFormat;
  enableRequestTiming: boolean;
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

export function loadDebugConfig(): DebugConfig {
  const enabled = toBool(process.env.QUERY_DEBUG_MODE, false);

  // Level, format and timing apply whether or not debug categories are on
  const logLevel = toLogLevel(process.env.QUERY_LOG_LEVEL, LogLevel.INFO);
  const logFormat = toLogFormat(process.env.QUERY_LOG_FORMAT, 'pretty');
  const enableRequestTiming = toBool(process.env.QUERY_ENABLE_REQUEST_TIMING, true);

  if (!enabled) {
    return {
      enabled: false,
      logLexer: false,
      logParser: false,
      logMetrics: false,
      logEntities: false,
      logCompiler: false,
      logLevel,
      logFormat,
      enableRequestTiming,
    };
  }

  return {
    enabled: true,
    logLexer: toBool(process.env.QUERY_DEBUG_LEXER, true),
    logParser: toBool(process.env.QUERY_DEBUG_PARSER, true),
    logMetrics: toBool(process.env.QUERY_DEBUG_METRICS, true),
    logEntities: toBool(process.env.QUERY_DEBUG_ENTITIES, true),
    logCompiler: toBool(process.env.QUERY_DEBUG_COMPILER, true),
    logLevel,
    logFormat,
    enableRequestTiming,
  };
}
