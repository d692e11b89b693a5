// ============================================================================
// covenant-pathways — Structured Logging
// ============================================================================

// ---------------------------------------------------------------------------
// Logger Interface
// ---------------------------------------------------------------------------

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

/**
 * Sink for the library's structured events.
 *
 * `event` is a stable snake_case identifier (e.g. `schema_generated`),
 * `message` a human-readable sentence, `data` any extra fields.
 */
export interface Logger {
  debug(event: string, message: string, data?: Record<string, unknown>): void;
  info(event: string, message: string, data?: Record<string, unknown>): void;
  warn(event: string, message: string, data?: Record<string, unknown>): void;
  error(event: string, message: string, data?: Record<string, unknown>): void;
}

/** A logger that discards everything. Default for every component. */
export const silentLogger: Logger = {
  debug() {},
  info() {},
  warn() {},
  error() {},
};

// ---------------------------------------------------------------------------
// ConsoleLogger — one JSON object per line
// ---------------------------------------------------------------------------

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  event: string;
  message: string;
  component?: string;
  data?: Record<string, unknown>;
}

export interface ConsoleLoggerOptions {
  /** Minimum level written. Defaults to `info`. */
  level?: LogLevel;
  /** Tag added to every entry, e.g. the contract family being compiled. */
  component?: string;
  /** Line sink. Defaults to `console.log`. */
  write?: (line: string) => void;
  /** Clock used for timestamps. */
  now?: () => Date;
}

/**
 * Writes each event as a single JSON line.
 *
 * @example
 * ```ts
 * const session = new PathwaySession({
 *   logger: new ConsoleLogger({ level: 'debug', component: 'vaults' }),
 * });
 * ```
 */
export class ConsoleLogger implements Logger {
  private readonly threshold: number;
  private readonly component?: string;
  private readonly write: (line: string) => void;
  private readonly now: () => Date;

  constructor(options: ConsoleLoggerOptions = {}) {
    this.threshold = LEVEL_ORDER[options.level ?? 'info'];
    this.component = options.component;
    this.write = options.write ?? ((line) => console.log(line));
    this.now = options.now ?? (() => new Date());
  }

  debug(event: string, message: string, data?: Record<string, unknown>): void {
    this.log('debug', event, message, data);
  }

  info(event: string, message: string, data?: Record<string, unknown>): void {
    this.log('info', event, message, data);
  }

  warn(event: string, message: string, data?: Record<string, unknown>): void {
    this.log('warn', event, message, data);
  }

  error(event: string, message: string, data?: Record<string, unknown>): void {
    this.log('error', event, message, data);
  }

  private log(level: LogLevel, event: string, message: string, data?: Record<string, unknown>): void {
    if (LEVEL_ORDER[level] < this.threshold) return;

    const entry: LogEntry = {
      timestamp: this.now().toISOString(),
      level,
      event,
      message,
    };
    if (this.component) entry.component = this.component;
    if (data) entry.data = data;

    this.write(JSON.stringify(entry, bigintReplacer));
  }
}

// Amounts are bigint throughout; JSON.stringify rejects them otherwise.
function bigintReplacer(_key: string, value: unknown): unknown {
  return typeof value === 'bigint' ? value.toString() : value;
}

// ---------------------------------------------------------------------------
// Environment
// ---------------------------------------------------------------------------

/** Parse a log level name, returning `undefined` for anything unrecognized. */
export function parseLogLevel(value: string | undefined): LogLevel | undefined {
  const normalized = value?.trim().toLowerCase();
  switch (normalized) {
    case 'debug':
    case 'info':
    case 'warn':
    case 'error':
      return normalized;
    default:
      return undefined;
  }
}

/**
 * Build a logger from `PATHWAYS_LOG_LEVEL`.
 *
 * Unset, blank or `silent` yields {@link silentLogger}; an unknown value
 * throws.
 */
export function createLoggerFromEnv(
  env: Record<string, string | undefined> = process.env,
  options: Omit<ConsoleLoggerOptions, 'level'> = {},
): Logger {
  const raw = env.PATHWAYS_LOG_LEVEL;
  if (raw === undefined || raw.trim() === '' || raw.trim().toLowerCase() === 'silent') {
    return silentLogger;
  }

  const level = parseLogLevel(raw);
  if (!level) {
    throw new Error(`Pathways: unknown PATHWAYS_LOG_LEVEL "${raw}" (expected debug, info, warn, error or silent)`);
  }
  return new ConsoleLogger({ ...options, level });
}
