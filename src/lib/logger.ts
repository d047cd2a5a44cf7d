// ============================================
// Structured JSON logging
// One JSON object per line: timestamp, level, message,
// stage and requestId when known
// ============================================

export type LogLevel = "debug" | "info" | "warn" | "error";

export type Stage =
  | "startup"
  | "api"
  | "codec"
  | "validation"
  | "preprocess"
  | "predict"
  | "help";

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

interface LogContext {
  requestId?: string;
  stage?: Stage;
  [key: string]: unknown;
}

interface LogEntry extends LogContext {
  timestamp: string;
  level: LogLevel;
  message: string;
}

let minimumLevel: LogLevel =
  process.env["NODE_ENV"] === "production" ? "info" : "debug";

/** Drop entries below `level`. Called once at startup from config. */
export function setLogLevel(level: LogLevel): void {
  minimumLevel = level;
}

function isEnabled(level: LogLevel): boolean {
  return LEVEL_RANK[level] >= LEVEL_RANK[minimumLevel];
}

function describeError(error: unknown): Record<string, unknown> {
  if (error instanceof Error) {
    return { errorName: error.name, errorMessage: error.message, errorStack: error.stack };
  }
  return error === undefined ? {} : { errorMessage: String(error) };
}

function write(level: LogLevel, message: string, context: LogContext = {}): void {
  if (!isEnabled(level)) return;

  const entry: LogEntry = {
    timestamp: new Date().toISOString(),
    level,
    message,
    ...context,
  };
  const line = JSON.stringify(entry);

  if (level === "error") {
    console.error(line);
  } else if (level === "warn") {
    console.warn(line);
  } else {
    console.log(line);
  }
}

/** Main logger with context support */
export const logger = {
  debug(message: string, context?: LogContext): void {
    write("debug", message, context);
  },

  info(message: string, context?: LogContext): void {
    write("info", message, context);
  },

  warn(message: string, context?: LogContext): void {
    write("warn", message, context);
  },

  error(message: string, context?: LogContext & { error?: unknown }): void {
    const { error, ...rest } = context ?? {};
    write("error", message, { ...rest, ...describeError(error) });
  },
};

type RequestContext = Omit<LogContext, "requestId">;

export interface RequestLogger {
  readonly requestId: string;
  debug(message: string, context?: RequestContext): void;
  info(message: string, context?: RequestContext): void;
  warn(message: string, context?: RequestContext): void;
  error(message: string, context?: RequestContext & { error?: unknown }): void;
  /** Child logger for a different stage */
  withStage(stage: Stage): RequestLogger;
  /** Child logger carrying extra fields */
  withContext(extra: Record<string, unknown>): RequestLogger;
}

/**
 * Create a logger bound to a request. `bound` fields are repeated on
 * every entry (e.g. the content type a request was decoded with).
 */
export function createRequestLogger(
  requestId: string,
  stage?: Stage,
  bound: Record<string, unknown> = {}
): RequestLogger {
  const base = { ...bound, requestId, stage };

  return {
    requestId,

    debug(message, context) {
      logger.debug(message, { ...base, ...context });
    },

    info(message, context) {
      logger.info(message, { ...base, ...context });
    },

    warn(message, context) {
      logger.warn(message, { ...base, ...context });
    },

    error(message, context) {
      logger.error(message, { ...base, ...context });
    },

    withStage(newStage) {
      return createRequestLogger(requestId, newStage, bound);
    },

    withContext(extra) {
      return createRequestLogger(requestId, stage, { ...bound, ...extra });
    },
  };
}
