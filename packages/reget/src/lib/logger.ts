// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

export interface LogEntry {
  level: LogLevel;
  message: string;
  timestamp: string;
  [key: string]: unknown;
}

/** Destination for formatted lines, split by severity */
export interface LogSink {
  out(line: string): void;
  err(line: string): void;
}

export interface LoggerOptions {
  level: LogLevel;
  json: boolean;
  sink?: LogSink;
  /** Injected for deterministic output in tests */
  now?: () => Date;
}

export interface Logger {
  debug(message: string, meta?: Record<string, unknown>): void;
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, meta?: Record<string, unknown>): void;
  child(defaultMeta: Record<string, unknown>): Logger;
}

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

const consoleSink: LogSink = {
  out: (line) => console.log(line),
  err: (line) => console.error(line),
};

// ---------------------------------------------------------------------------
// Logger Implementation
// ---------------------------------------------------------------------------

/**
 * Create a structured logger.
 * debug/info go to the sink's `out`, warn/error to `err` (stdout and stderr
 * by default). JSON mode emits one object per line.
 */
export function createLogger(options: LoggerOptions): Logger {
  const minLevel = LOG_LEVELS[options.level];
  const sink = options.sink ?? consoleSink;
  const now = options.now ?? (() => new Date());

  function formatMessage(
    level: LogLevel,
    message: string,
    meta: Record<string, unknown>
  ): string {
    const timestamp = now().toISOString();

    if (options.json) {
      const entry: LogEntry = { timestamp, level, message, ...meta };
      return JSON.stringify(entry);
    }

    const { component, ...rest } = meta;
    const scope = typeof component === "string" ? ` [${component}]` : "";
    const prefix = `[${timestamp}] ${level.toUpperCase().padEnd(5)}${scope}`;
    const metaStr = Object.keys(rest).length > 0 ? ` ${JSON.stringify(rest)}` : "";
    return `${prefix} ${message}${metaStr}`;
  }

  function log(
    level: Exclude<LogLevel, "silent">,
    message: string,
    meta: Record<string, unknown> = {},
    defaultMeta: Record<string, unknown> = {}
  ): void {
    if (LOG_LEVELS[level] < minLevel) return;

    const formatted = formatMessage(level, message, { ...defaultMeta, ...meta });

    if (level === "warn" || level === "error") {
      sink.err(formatted);
    } else {
      sink.out(formatted);
    }
  }

  function createLoggerInstance(defaultMeta: Record<string, unknown> = {}): Logger {
    return {
      debug: (msg, meta) => log("debug", msg, meta, defaultMeta),
      info: (msg, meta) => log("info", msg, meta, defaultMeta),
      warn: (msg, meta) => log("warn", msg, meta, defaultMeta),
      error: (msg, meta) => log("error", msg, meta, defaultMeta),
      child: (childMeta) => createLoggerInstance({ ...defaultMeta, ...childMeta }),
    };
  }

  return createLoggerInstance();
}

/**
 * Create a logger that discards all messages.
 */
export function createNoopLogger(): Logger {
  const noop = () => {};
  const logger: Logger = {
    debug: noop,
    info: noop,
    warn: noop,
    error: noop,
    child: () => logger,
  };
  return logger;
}
