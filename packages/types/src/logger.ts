/**
 * JSON-lines logging shared by every Tracemark package.
 *
 * Library code takes an optional {@link Logger} and falls back to
 * {@link silentLogger}; only the CLI decides where entries go and at which
 * threshold.
 *
 * @packageDocumentation
 */

// ─── Levels ─────────────────────────────────────────────────────────────────────

/** Ordered severities. An entry is written when its level is at or above the threshold. */
export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  SILENT = 4,
}

/** The spelling of a level in `tracemark.config.json`. */
export type LogLevelName = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LEVEL_LABELS: Record<LogLevel, string> = {
  [LogLevel.DEBUG]: 'DEBUG',
  [LogLevel.INFO]: 'INFO',
  [LogLevel.WARN]: 'WARN',
  [LogLevel.ERROR]: 'ERROR',
  [LogLevel.SILENT]: 'SILENT',
};

const LEVELS_BY_NAME: Record<LogLevelName, LogLevel> = {
  debug: LogLevel.DEBUG,
  info: LogLevel.INFO,
  warn: LogLevel.WARN,
  error: LogLevel.ERROR,
  silent: LogLevel.SILENT,
};

export function isLogLevelName(value: unknown): value is LogLevelName {
  return typeof value === 'string' && Object.prototype.hasOwnProperty.call(LEVELS_BY_NAME, value);
}

export function logLevelFromName(name: LogLevelName): LogLevel {
  return LEVELS_BY_NAME[name];
}

// ─── Entries and sinks ──────────────────────────────────────────────────────────

/** One log line. Caller fields are spread after the fixed ones. */
export interface LogEntry {
  /** Upper-case level label, e.g. `"WARN"`. */
  level: string;
  message: string;
  timestamp: string;
  /** Dotted path of the logger that wrote the entry, e.g. `"cli.sig"`. */
  component?: string;
  [key: string]: unknown;
}

export type LogOutput = (entry: LogEntry) => void;

/** One JSON object per line on stderr, leaving stdout to command output. */
const stderrOutput: LogOutput = (entry) => {
  console.error(JSON.stringify(entry));
};

export interface LoggerOptions {
  /** Threshold; {@link LogLevel.INFO} when omitted. */
  level?: LogLevel;
  component?: string;
  /** Sink for entries; JSON on stderr when omitted. */
  output?: LogOutput;
  /** Timestamp source, for tests. */
  now?: () => string;
}

/** Threshold shared by a root logger and every child derived from it. */
export interface Threshold {
  level: LogLevel;
}

// ─── Logger ─────────────────────────────────────────────────────────────────────

/**
 * ```ts
 * const log = new Logger({ level: LogLevel.DEBUG, component: 'cli' });
 * const graphLog = log.child('graph');
 * graphLog.warn('events without timestamps were stamped with the build time', { count: 2 });
 * // {"level":"WARN","message":"events without ...","timestamp":"...","component":"cli.graph","count":2}
 * ```
 *
 * A child shares its parent's threshold: raising or lowering the level on
 * any logger of a family applies to all of them, including children created
 * before the change.
 */
export class Logger {
  private readonly threshold: Threshold;
  private readonly component: string | undefined;
  private readonly output: LogOutput;
  private readonly now: () => string;

  /** @param shared - Threshold of the parent; set only by {@link Logger.child}. */
  constructor(options?: LoggerOptions, shared?: Threshold) {
    this.threshold = shared ?? { level: options?.level ?? LogLevel.INFO };
    this.component = options?.component;
    this.output = options?.output ?? stderrOutput;
    this.now = options?.now ?? (() => new Date().toISOString());
  }

  debug(message: string, fields?: Record<string, unknown>): void {
    this.write(LogLevel.DEBUG, message, fields);
  }

  info(message: string, fields?: Record<string, unknown>): void {
    this.write(LogLevel.INFO, message, fields);
  }

  warn(message: string, fields?: Record<string, unknown>): void {
    this.write(LogLevel.WARN, message, fields);
  }

  error(message: string, fields?: Record<string, unknown>): void {
    this.write(LogLevel.ERROR, message, fields);
  }

  /** A logger for `component`, nested under this one's component as `parent.component`. */
  child(component: string): Logger {
    return new Logger(
      {
        component: this.component === undefined ? component : `${this.component}.${component}`,
        output: this.output,
        now: this.now,
      },
      this.threshold,
    );
  }

  setLevel(level: LogLevel): void {
    this.threshold.level = level;
  }

  getLevel(): LogLevel {
    return this.threshold.level;
  }

  private write(level: LogLevel, message: string, fields?: Record<string, unknown>): void {
    if (level < this.threshold.level) {
      return;
    }
    this.output({
      level: LEVEL_LABELS[level],
      message,
      timestamp: this.now(),
      ...(this.component === undefined ? {} : { component: this.component }),
      ...fields,
    });
  }
}

/** Drops every entry. The default for library calls made without a logger. */
export const silentLogger: Logger = new Logger({ level: LogLevel.SILENT });
