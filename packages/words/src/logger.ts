/**
 * Level-filtered logging for lexiphrase modules.
 *
 * Debug output is off unless `debugMode` is set through `setLoggerConfig`
 * or the `LEXIPHRASE_DEBUG` environment variable.
 */

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
}

/**
 * Where formatted lines are written.
 */
export interface LogSink {
  log(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

export interface LoggerConfig {
  debugMode: boolean;
  prefix: string;
  sink: LogSink;
}

function debugFromEnv(): boolean {
  const value = process.env.LEXIPHRASE_DEBUG;
  return value !== undefined && value !== '' && value !== '0' && value !== 'false';
}

let config: LoggerConfig = {
  debugMode: debugFromEnv(),
  prefix: '[lexiphrase]',
  sink: console,
};

/**
 * Update logger configuration
 */
export function setLoggerConfig(newConfig: Partial<LoggerConfig>): void {
  config = { ...config, ...newConfig };
}

/**
 * Check if debug mode is enabled
 */
export function isDebugMode(): boolean {
  return config.debugMode;
}

const LEVEL_LABELS: Record<LogLevel, string> = {
  [LogLevel.DEBUG]: 'debug',
  [LogLevel.INFO]: 'info',
  [LogLevel.WARN]: 'warn',
  [LogLevel.ERROR]: 'error',
};

function formatMessage(level: LogLevel, module: string, message: string): string {
  const modulePrefix = module ? ` [${module}]` : '';
  return `${config.prefix} ${LEVEL_LABELS[level]}${modulePrefix} ${message}`;
}

function log(
  level: LogLevel,
  module: string,
  message: string,
  ...args: unknown[]
): void {
  if (level === LogLevel.DEBUG && !config.debugMode) {
    return;
  }

  const formatted = formatMessage(level, module, message);

  switch (level) {
    case LogLevel.DEBUG:
    case LogLevel.INFO:
      config.sink.log(formatted, ...args);
      break;
    case LogLevel.WARN:
      config.sink.warn(formatted, ...args);
      break;
    case LogLevel.ERROR:
      config.sink.error(formatted, ...args);
      break;
  }
}

export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

/**
 * Create a logger instance for a specific module
 */
export function createLogger(moduleName: string): Logger {
  return {
    debug: (message, ...args) =>
      log(LogLevel.DEBUG, moduleName, message, ...args),
    info: (message, ...args) =>
      log(LogLevel.INFO, moduleName, message, ...args),
    warn: (message, ...args) =>
      log(LogLevel.WARN, moduleName, message, ...args),
    error: (message, ...args) =>
      log(LogLevel.ERROR, moduleName, message, ...args),
  };
}

/**
 * Start a timer; the returned function yields elapsed milliseconds.
 */
export function startTimer(): () => number {
  const start = performance.now();
  return () => performance.now() - start;
}
