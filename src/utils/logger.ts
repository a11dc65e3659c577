/**
 * Structured logging utility.
 *
 * Every component of the workflow logs through a {@link Logger} bound to its
 * component name. Entries are written as one JSON object per line so that the
 * operator's terminal (stdout) stays free for prompts.
 *
 * @packageDocumentation
 */

/**
 * Severity level for log entries.
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * A structured log entry.
 */
export interface LogEntry {
  /**
   * ISO 8601 timestamp when the log entry was created.
   * @example "2024-01-15T10:30:00.000Z"
   */
  readonly timestamp: string;

  readonly level: LogLevel;

  /**
   * Name of the component that generated this entry.
   * @example "GateController"
   */
  readonly component: string;

  /**
   * Short snake_case event name.
   * @example "phase_approved"
   */
  readonly event: string;

  /** Additional structured data. */
  readonly data?: Record<string, unknown>;
}

/**
 * Destination for serialized log lines.
 */
export type LogSink = (line: string) => void;

/**
 * Configuration options for creating a Logger instance.
 */
export interface LoggerOptions {
  /** Name of the component using this logger. */
  readonly component: string;

  /**
   * Whether debug-level logging is enabled.
   * @defaultValue false
   */
  readonly debugMode?: boolean | undefined;

  /**
   * Where serialized lines go.
   * @defaultValue writes to process.stderr
   */
  readonly sink?: LogSink | undefined;
}

const stderrSink: LogSink = (line) => {
  process.stderr.write(line);
};

/**
 * Structured logger that outputs JSON-formatted log entries.
 *
 * @example
 * ```typescript
 * const logger = new Logger({ component: 'GateController', debugMode: true });
 * logger.info('phase_approved', { phase: 3, agent: 'Planner' });
 * ```
 */
export class Logger {
  private readonly component: string;
  private readonly debugMode: boolean;
  private readonly sink: LogSink;

  constructor(options: LoggerOptions) {
    this.component = options.component;
    this.debugMode = options.debugMode ?? false;
    this.sink = options.sink ?? stderrSink;
  }

  /**
   * Creates a logger for another component sharing this logger's settings.
   *
   * @param component - The child component name.
   */
  child(component: string): Logger {
    return new Logger({ component, debugMode: this.debugMode, sink: this.sink });
  }

  /** Whether debug output is enabled. */
  isDebugEnabled(): boolean {
    return this.debugMode;
  }

  /**
   * Logs a debug-level message. No-op unless debugMode is enabled.
   */
  debug(event: string, data?: Record<string, unknown>): void {
    if (!this.debugMode) {
      return;
    }
    this.log('debug', event, data);
  }

  info(event: string, data?: Record<string, unknown>): void {
    this.log('info', event, data);
  }

  warn(event: string, data?: Record<string, unknown>): void {
    this.log('warn', event, data);
  }

  error(event: string, data?: Record<string, unknown>): void {
    this.log('error', event, data);
  }

  private log(level: LogLevel, event: string, data?: Record<string, unknown>): void {
    const entry: LogEntry =
      data === undefined
        ? { timestamp: new Date().toISOString(), level, component: this.component, event }
        : { timestamp: new Date().toISOString(), level, component: this.component, event, data };

    this.sink(serializeEntry(entry) + '\n');
  }
}

/**
 * Serializes an entry, degrading to a marker when `data` cannot be stringified
 * (circular references, BigInt values).
 */
function serializeEntry(entry: LogEntry): string {
  try {
    return JSON.stringify(entry);
  } catch (error) {
    return JSON.stringify({
      timestamp: entry.timestamp,
      level: entry.level,
      component: entry.component,
      event: entry.event,
      serializationError: error instanceof Error ? error.message : String(error),
      originalData: '[unserializable]',
    });
  }
}

/**
 * Logger that discards everything. Used where a caller passes no logger.
 */
export const silentLogger = new Logger({
  component: 'silent',
  sink: () => {
    // discard
  },
});
