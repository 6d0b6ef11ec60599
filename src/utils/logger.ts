/**
 * Structured Logger for Cortex Chat
 *
 * Module-scoped loggers share one process-wide configuration: minimum
 * level, plain or JSON lines, timestamps, and a sink. `configureLogger`
 * applies to loggers that already exist, so modules can create theirs at
 * import time.
 *
 * @module utils/logger
 */

/**
 * Log levels in order of severity
 */
export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  SILENT = 4,
}

export type LevelName = Exclude<keyof typeof LogLevel, 'SILENT'>;

const LEVEL_NAMES: Readonly<Record<LevelName, LogLevel>> = {
  DEBUG: LogLevel.DEBUG,
  INFO: LogLevel.INFO,
  WARN: LogLevel.WARN,
  ERROR: LogLevel.ERROR,
};

export interface LogEntry {
  timestamp: string;
  level: LevelName;
  module: string;
  message: string;
  data?: Record<string, unknown>;
}

/** Receives every formatted line that passes the level filter */
export type LogSink = (level: LogLevel, line: string) => void;

export interface LoggerConfig {
  level: LogLevel;
  json: boolean;
  includeTimestamp: boolean;
  sink: LogSink;
}

const consoleSink: LogSink = (level, line) => {
  if (level >= LogLevel.ERROR) console.error(line);
  else if (level === LogLevel.WARN) console.warn(line);
  else if (level === LogLevel.DEBUG) console.debug(line);
  else console.log(line);
};

const DEFAULTS: Readonly<LoggerConfig> = Object.freeze({
  level: LogLevel.INFO,
  json: false,
  includeTimestamp: true,
  sink: consoleSink,
});

let shared: LoggerConfig = { ...DEFAULTS };

/**
 * Render one entry: a JSON object, or `[time] [LEVEL] [module] message {data}`
 */
export function formatEntry(entry: LogEntry, config: Pick<LoggerConfig, 'json' | 'includeTimestamp'>): string {
  if (config.json) {
    return JSON.stringify(entry);
  }
  const stamp = config.includeTimestamp ? `[${entry.timestamp}] ` : '';
  const data = entry.data && Object.keys(entry.data).length > 0 ? ` ${JSON.stringify(entry.data)}` : '';
  return `${stamp}[${entry.level}] [${entry.module}] ${entry.message}${data}`;
}

/**
 * Level from a name such as "debug" or "WARN"; undefined when unknown
 */
export function parseLogLevel(value: string | undefined): LogLevel | undefined {
  const name = value?.trim().toUpperCase();
  if (name === 'SILENT') return LogLevel.SILENT;
  return Object.entries(LEVEL_NAMES).find(([key]) => key === name)?.[1];
}

export class Logger {
  readonly module: string;

  constructor(module: string) {
    this.module = module;
  }

  isEnabled(level: LogLevel): boolean {
    return level !== LogLevel.SILENT && level >= shared.level;
  }

  private write(level: LevelName, message: string, data?: Record<string, unknown>): void {
    const severity = LEVEL_NAMES[level];
    if (!this.isEnabled(severity)) return;

    const line = formatEntry(
      { timestamp: new Date().toISOString(), level, module: this.module, message, data },
      shared
    );
    shared.sink(severity, line);
  }

  debug(message: string, data?: Record<string, unknown>): void {
    this.write('DEBUG', message, data);
  }

  info(message: string, data?: Record<string, unknown>): void {
    this.write('INFO', message, data);
  }

  warn(message: string, data?: Record<string, unknown>): void {
    this.write('WARN', message, data);
  }

  error(message: string, data?: Record<string, unknown>): void {
    this.write('ERROR', message, data);
  }

  /**
   * Start a timer; calling the result logs the elapsed time at debug level
   */
  time(label: string): () => number {
    const start = performance.now();
    return () => {
      const elapsed = performance.now() - start;
      this.debug(`${label} completed`, { durationMs: Math.round(elapsed * 1000) / 1000 });
      return elapsed;
    };
  }

  /** Logger for `<module>:<subModule>` */
  child(subModule: string): Logger {
    return new Logger(`${this.module}:${subModule}`);
  }
}

export function configureLogger(config: Partial<LoggerConfig>): void {
  shared = { ...shared, ...config };
}

/**
 * Back to the defaults (tests)
 */
export function resetLogger(): void {
  shared = { ...DEFAULTS };
}

export function createLogger(module: string): Logger {
  return new Logger(module);
}

export const coreLogger = createLogger('core');
export const servicesLogger = createLogger('services');
export const storageLogger = createLogger('storage');
export const cliLogger = createLogger('cli');
export const apiLogger = createLogger('api');
