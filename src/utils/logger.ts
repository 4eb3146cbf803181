/**
 * Structured logging for the governor.
 *
 * Every component logs through a {@link Logger} that writes one JSON object per
 * line. Output goes to stderr unless a different sink is supplied.
 *
 * @packageDocumentation
 */

/**
 * Severity level for log entries.
 *
 * - `debug`: scheduling decisions and other per-call detail
 * - `info`: normal routing events (a backend answered, a fallback was chosen)
 * - `warn`: degraded conditions (budget warning, skipped backend)
 * - `error`: a call could not be served at all
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * One structured log record.
 */
export interface LogEntry {
  /**
   * ISO 8601 timestamp when the entry was created.
   * @example "2024-01-15T10:30:00.000Z"
   */
  readonly timestamp: string;

  /** Severity of the entry. */
  readonly level: LogLevel;

  /**
   * Component that produced the entry.
   * @example "Router"
   */
  readonly component: string;

  /**
   * Short snake_case event name.
   * @example "fallback_selected"
   */
  readonly event: string;

  /** JSON-serializable context for the event. */
  readonly data?: Record<string, unknown>;
}

/**
 * Destination for serialized log entries.
 */
export type LogSink = (entry: LogEntry) => void;

/**
 * Options for creating a {@link Logger}.
 */
export interface LoggerOptions {
  /** Component name stamped on every entry. */
  readonly component: string;

  /**
   * Whether debug-level entries are emitted.
   * @defaultValue false
   */
  readonly debugMode?: boolean;

  /**
   * Where entries are written.
   * @defaultValue {@link stderrSink}
   */
  readonly sink?: LogSink;

  /** Clock used for timestamps (injectable for testing). */
  readonly now?: () => Date;
}

/**
 * Serializes an entry to one JSON line.
 *
 * Data that JSON cannot represent (circular references, BigInt) is replaced by
 * a marker, and the serializer's message is kept under `serializationError`.
 *
 * @param entry - Entry to serialize.
 * @returns JSON text terminated by a newline.
 */
export function serializeEntry(entry: LogEntry): string {
  try {
    return JSON.stringify(entry) + '\n';
  } catch (error) {
    const fallback = {
      timestamp: entry.timestamp,
      level: entry.level,
      component: entry.component,
      event: entry.event,
      serializationError: error instanceof Error ? error.message : String(error),
      originalData: '[unserializable]',
    };
    return JSON.stringify(fallback) + '\n';
  }
}

/**
 * Writes each entry to stderr as a single JSON line.
 */
export const stderrSink: LogSink = (entry) => {
  process.stderr.write(serializeEntry(entry));
};

/**
 * Sink that drops everything. Used as the default in tests and by callers
 * that route telemetry elsewhere.
 */
export const silentSink: LogSink = () => undefined;

/**
 * Leveled JSON logger.
 *
 * @example
 * ```typescript
 * const logger = new Logger({ component: 'Router', debugMode: true });
 * logger.info('fallback_selected', { from: 'openai/gpt-4o', to: 'gemini/gemini-2.5-pro' });
 * ```
 */
export class Logger {
  private readonly component: string;
  private readonly debugMode: boolean;
  private readonly sink: LogSink;
  private readonly now: () => Date;

  /**
   * @param options - Configuration options for the logger.
   */
  constructor(options: LoggerOptions) {
    this.component = options.component;
    this.debugMode = options.debugMode ?? false;
    this.sink = options.sink ?? stderrSink;
    this.now = options.now ?? ((): Date => new Date());
  }

  /**
   * Returns a logger for another component that shares this logger's sink,
   * clock and debug setting.
   *
   * @param component - Component name for the new logger.
   */
  child(component: string): Logger {
    return new Logger({
      component,
      debugMode: this.debugMode,
      sink: this.sink,
      now: this.now,
    });
  }

  /** Whether debug-level entries are emitted. */
  get isDebugEnabled(): boolean {
    return this.debugMode;
  }

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
    const base = {
      timestamp: this.now().toISOString(),
      level,
      component: this.component,
      event,
    };
    const entry: LogEntry = data === undefined ? base : { ...base, data };
    this.sink(entry);
  }
}

/**
 * Creates a logger that discards all output.
 *
 * @param component - Component name for the logger.
 */
export function createSilentLogger(component = 'silent'): Logger {
  return new Logger({ component, sink: silentSink });
}
