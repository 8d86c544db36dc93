/**
 * Structured logging utility.
 *
 * Every entry is one JSON line on stderr, so stdout stays free for command
 * output.
 *
 * @packageDocumentation
 */

/**
 * Severity level for log entries.
 *
 * - `debug`: per-generation detail, only emitted in debug mode
 * - `info`: normal progress such as a finished build
 * - `warn`: a bound was hit or a check failed
 * - `error`: an operation aborted
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * A structured log entry.
 */
export interface LogEntry {
  /**
   * ISO 8601 timestamp when the entry was created.
   * @example "2024-01-15T10:30:00.000Z"
   */
  readonly timestamp: string;

  /** Severity level of the entry. */
  readonly level: LogLevel;

  /**
   * Name of the component that produced the entry.
   * @example "ClosureEngine"
   */
  readonly component: string;

  /**
   * Short snake_case name of the event.
   * @example "attractor_converged"
   */
  readonly event: string;

  /**
   * JSON-serializable context.
   * @example { seed: "X", generation: 2 }
   */
  readonly data?: Record<string, unknown>;
}

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
  readonly debugMode?: boolean;
}

/**
 * Structured logger that writes JSON lines to stderr.
 *
 * @example
 * ```typescript
 * const logger = new Logger({ component: 'ClosureEngine', debugMode: true });
 * logger.info('attractor_converged', { seed: 'X', generation: 2 });
 * ```
 */
export class Logger {
  private readonly component: string;
  private readonly debugMode: boolean;

  /**
   * Creates a new Logger instance.
   * @param options - Configuration options for the logger.
   */
  constructor(options: LoggerOptions) {
    this.component = options.component;
    this.debugMode = options.debugMode ?? false;
  }

  /** Whether debug entries are written. */
  get isDebugEnabled(): boolean {
    return this.debugMode;
  }

  /**
   * Returns a logger with the same settings for another component.
   *
   * @param component - Component name for the new logger.
   */
  forComponent(component: string): Logger {
    return new Logger({ component, debugMode: this.debugMode });
  }

  /**
   * Logs a debug-level message. No-op unless debug mode is on.
   *
   * @param event - Brief description of the event.
   * @param data - Optional structured data for additional context.
   */
  debug(event: string, data?: Record<string, unknown>): void {
    if (!this.debugMode) {
      return;
    }
    this.log('debug', event, data);
  }

  /**
   * Logs an info-level message.
   *
   * @param event - Brief description of the event.
   * @param data - Optional structured data for additional context.
   */
  info(event: string, data?: Record<string, unknown>): void {
    this.log('info', event, data);
  }

  /**
   * Logs a warning-level message.
   *
   * @param event - Brief description of the event.
   * @param data - Optional structured data for additional context.
   */
  warn(event: string, data?: Record<string, unknown>): void {
    this.log('warn', event, data);
  }

  /**
   * Logs an error-level message.
   *
   * @param event - Brief description of the event.
   * @param data - Optional structured data for additional context.
   */
  error(event: string, data?: Record<string, unknown>): void {
    this.log('error', event, data);
  }

  private log(level: LogLevel, event: string, data?: Record<string, unknown>): void {
    const entry: LogEntry =
      data === undefined
        ? { timestamp: new Date().toISOString(), level, component: this.component, event }
        : { timestamp: new Date().toISOString(), level, component: this.component, event, data };

    let line: string;
    try {
      line = JSON.stringify(entry);
    } catch (error) {
      // Circular structures and BigInt values cannot be serialized.
      line = JSON.stringify({
        timestamp: entry.timestamp,
        level,
        component: this.component,
        event,
        serializationError: error instanceof Error ? error.message : String(error),
        originalData: '[unserializable]',
      });
    }

    process.stderr.write(line + '\n');
  }
}
