/**
 * Define log levels
 * Can be controlled by environment variable `LOG_LEVEL`.
 * Examples: LOG_LEVEL=DEBUG, LOG_LEVEL=INFO, LOG_LEVEL=WARN, LOG_LEVEL=ERROR
 *
 * Priority: ERROR > WARN > LOG > INFO > DEBUG
 * Only logs at or above the set level will be output
 */

export enum LogLevel {
  ERROR = "ERROR",
  WARN = "WARN",
  INFO = "INFO",
  DEBUG = "DEBUG",
  LOG = "LOG",
}

export type LogRecord = {
  tsMs: number;
  level: LogLevel;
  scope?: string;
  message: string;
  fields?: Record<string, string>;
};

export interface LogSink {
  write(record: LogRecord): void;
}

export interface Logger {
  log: (...args: unknown[]) => void;
  info: (...args: unknown[]) => void;
  debug: (...args: unknown[]) => void;
  warn: (...args: unknown[]) => void;
  error: (...args: unknown[]) => void;
}

// Define log level priority (lower number = higher priority)
const LOG_LEVEL_PRIORITY = {
  [LogLevel.ERROR]: 0,
  [LogLevel.WARN]: 1,
  [LogLevel.LOG]: 2,
  [LogLevel.INFO]: 3,
  [LogLevel.DEBUG]: 4,
} as const;

/** Field names whose values never reach the output */
const REDACT_KEYS = new Set(["secret", "teamsecret", "team_secret", "token", "password", "apikey"]);

const REDACTED = "[REDACTED]";

const isLogLevel = (value: string): value is LogLevel => Object.values<string>(LogLevel).includes(value);

const getCurrentLogLevel = (): LogLevel => {
  const envLevel = process.env.LOG_LEVEL?.toUpperCase();

  if (envLevel && isLogLevel(envLevel)) {
    return envLevel;
  }

  // Default is INFO
  return LogLevel.INFO;
};

// Check if a log at the specified level should be output
const shouldLog = (level: LogLevel): boolean => {
  const currentLevel = getCurrentLogLevel();
  return LOG_LEVEL_PRIORITY[level] <= LOG_LEVEL_PRIORITY[currentLevel];
};

const colorize = (message: string, level: LogLevel): string => {
  const colors = {
    [LogLevel.ERROR]: "\x1b[31m", // Red
    [LogLevel.WARN]: "\x1b[33m", // Yellow
    [LogLevel.INFO]: "\x1b[36m", // Cyan
    [LogLevel.DEBUG]: "\x1b[32m", // Green
    [LogLevel.LOG]: null, // No color (standard)
  };

  const color = colors[level];
  if (color === null) {
    return message;
  }

  return `${color}${message}\x1b[0m`;
};

const formatHeader = (level: LogLevel, scope?: string): string => {
  const scopeTag = scope ? ` [${scope}]` : "";
  return colorize(`[${new Date().toISOString()}] [${level}]${scopeTag}`, level);
};

/**
 * Mask `team_secret=...` query parameters inside URLs
 */
export function redactUrl(url: string): string {
  return url.replace(/(team_secret=)[^&]*/gi, `$1${REDACTED}`);
}

function stringifyValue(value: unknown): string {
  if (typeof value === "string") return redactUrl(value);
  if (value instanceof Error) return value.message;
  return JSON.stringify(value) ?? String(value);
}

function isFieldsObject(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object" && !(value instanceof Error) && !Array.isArray(value);
}

/**
 * Redact secret-looking keys (one level deep) before output
 */
export function redactFields(fields: Record<string, unknown>): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  for (const [k, v] of Object.entries(fields)) {
    out[k] = REDACT_KEYS.has(k.toLowerCase()) ? REDACTED : typeof v === "string" ? redactUrl(v) : v;
  }
  return out;
}

function toFields(args: unknown[]): Record<string, string> | undefined {
  // Common case in this codebase: logger.info("msg", { ...fields })
  const maybeFields = args[1];
  if (!isFieldsObject(maybeFields)) return undefined;

  const out: Record<string, string> = {};
  for (const [k, v] of Object.entries(redactFields(maybeFields))) {
    out[k] = stringifyValue(v);
  }
  return Object.keys(out).length > 0 ? out : undefined;
}

function toMessage(args: unknown[]): string {
  if (args.length === 0) return "";
  const [first, ...rest] = args;

  const head = stringifyValue(first);

  // The fields object lives in `fields`, not the message.
  const tail = isFieldsObject(rest[0]) ? rest.slice(1) : rest;
  if (tail.length === 0) return head;

  return `${head} ${tail.map(stringifyValue).join(" ")}`.trim();
}

function toConsoleArgs(args: unknown[]): unknown[] {
  return args.map(a => (typeof a === "string" ? redactUrl(a) : isFieldsObject(a) ? redactFields(a) : a));
}

let sink: LogSink | null = null;

function emit(
  level: LogLevel,
  scope: string | undefined,
  args: unknown[],
  consoleFn: (...a: unknown[]) => void,
): void {
  if (!shouldLog(level)) return;

  if (sink) {
    sink.write({
      tsMs: Date.now(),
      level,
      scope,
      message: toMessage(args),
      fields: toFields(args),
    });
    return;
  }

  consoleFn(formatHeader(level, scope), ...toConsoleArgs(args));
}

function createScopedLogger(scope?: string): Logger {
  return {
    log: (...args: unknown[]) => {
      emit(LogLevel.LOG, scope, args, console.log);
    },
    info: (...args: unknown[]) => {
      emit(LogLevel.INFO, scope, args, console.info);
    },
    debug: (...args: unknown[]) => {
      emit(LogLevel.DEBUG, scope, args, console.log);
    },
    warn: (...args: unknown[]) => {
      emit(LogLevel.WARN, scope, args, console.warn);
    },
    error: (...args: unknown[]) => {
      emit(LogLevel.ERROR, scope, args, console.error);
    },
  };
}

export const logger = {
  ...createScopedLogger(),
  /**
   * Logger whose records carry a component tag, e.g. `[market-data]`
   */
  child: (scope: string): Logger => createScopedLogger(scope),
  /**
   * Get the currently set log level
   */
  getCurrentLevel: (): LogLevel => getCurrentLogLevel(),
  /**
   * Route logs to a custom sink (e.g., test capture).
   * While a sink is set nothing is printed to the console.
   */
  setSink: (next: LogSink) => {
    sink = next;
  },
  /**
   * Restore default console logging.
   */
  clearSink: () => {
    sink = null;
  },
};
