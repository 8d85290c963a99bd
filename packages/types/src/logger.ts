/**
 * Structured logging for the simulator packages.
 *
 * Emits one JSON-shaped entry per call. Child loggers extend the component
 * path and can bind fields that are merged into every entry they emit.
 *
 * @packageDocumentation
 */

// ─── Log levels ─────────────────────────────────────────────────────────────────

/**
 * Numeric log levels. An entry is emitted only when its level is greater
 * than or equal to the logger's threshold.
 */
export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  /** Suppress all output. */
  SILENT = 4,
}

// ─── Types ──────────────────────────────────────────────────────────────────────

/** A single structured log entry. */
export interface LogEntry {
  /** Level name, e.g. "DEBUG". */
  level: string;
  message: string;
  /** ISO 8601 timestamp. */
  timestamp: string;
  /** Dotted component path, e.g. "simulator.driver". */
  component?: string;
  [key: string]: unknown;
}

/** Sink for formatted entries. The default writes JSON to `console.log`. */
export type LogOutput = (entry: LogEntry) => void;

// ─── Helpers ────────────────────────────────────────────────────────────────────

const LEVEL_NAMES: Record<LogLevel, string> = {
  [LogLevel.DEBUG]: 'DEBUG',
  [LogLevel.INFO]: 'INFO',
  [LogLevel.WARN]: 'WARN',
  [LogLevel.ERROR]: 'ERROR',
  [LogLevel.SILENT]: 'SILENT',
};

const ALL_LEVELS: readonly LogLevel[] = [
  LogLevel.DEBUG,
  LogLevel.INFO,
  LogLevel.WARN,
  LogLevel.ERROR,
  LogLevel.SILENT,
];

const defaultOutput: LogOutput = (entry: LogEntry): void => {
  console.log(JSON.stringify(entry));
};

/**
 * Parse a level name such as `"debug"` or `"WARN"`.
 * Returns `undefined` for unknown names.
 */
export function parseLogLevel(name: string): LogLevel | undefined {
  const upper = name.trim().toUpperCase();
  return ALL_LEVELS.find((level) => LEVEL_NAMES[level] === upper);
}

// ─── Logger options ─────────────────────────────────────────────────────────────

export interface LoggerOptions {
  /** Minimum level to emit. Defaults to {@link LogLevel.INFO}. */
  level?: LogLevel;
  component?: string;
  output?: LogOutput;
  /** Fields merged into every entry. Per-call fields win on conflict. */
  fields?: Record<string, unknown>;
}

// ─── Logger class ───────────────────────────────────────────────────────────────

/**
 * ```ts
 * const log = new Logger({ level: LogLevel.DEBUG, component: 'simulator' });
 * const driver = log.child('driver', { attack: 'equivocation' });
 * driver.warn('unexpected QC', { proposal: 'Y@v1' });
 * ```
 */
export class Logger {
  private level: LogLevel;
  private readonly component: string | undefined;
  private readonly output: LogOutput;
  private readonly fields: Record<string, unknown>;

  constructor(options?: LoggerOptions) {
    this.level = options?.level ?? LogLevel.INFO;
    this.component = options?.component;
    this.output = options?.output ?? defaultOutput;
    this.fields = { ...options?.fields };
  }

  debug(message: string, fields?: Record<string, unknown>): void {
    this.log(LogLevel.DEBUG, message, fields);
  }

  info(message: string, fields?: Record<string, unknown>): void {
    this.log(LogLevel.INFO, message, fields);
  }

  warn(message: string, fields?: Record<string, unknown>): void {
    this.log(LogLevel.WARN, message, fields);
  }

  error(message: string, fields?: Record<string, unknown>): void {
    this.log(LogLevel.ERROR, message, fields);
  }

  /**
   * Create a child logger sharing this logger's level and output.
   * The child's component is `parent.child` when the parent has one.
   */
  child(component: string, fields?: Record<string, unknown>): Logger {
    const childComponent = this.component
      ? `${this.component}.${component}`
      : component;

    return new Logger({
      level: this.level,
      component: childComponent,
      output: this.output,
      fields: { ...this.fields, ...fields },
    });
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  getLevel(): LogLevel {
    return this.level;
  }

  isEnabled(level: LogLevel): boolean {
    return level !== LogLevel.SILENT && level >= this.level;
  }

  private log(level: LogLevel, message: string, fields?: Record<string, unknown>): void {
    if (!this.isEnabled(level)) {
      return;
    }

    const entry: LogEntry = {
      ...this.fields,
      ...fields,
      level: LEVEL_NAMES[level],
      message,
      timestamp: new Date().toISOString(),
      ...(this.component !== undefined ? { component: this.component } : {}),
    };

    this.output(entry);
  }
}

// ─── Factory ────────────────────────────────────────────────────────────────────

export function createLogger(options?: LoggerOptions): Logger {
  return new Logger(options);
}

/** A logger that drops everything; the default for library entry points. */
export const silentLogger: Logger = createLogger({ level: LogLevel.SILENT });
