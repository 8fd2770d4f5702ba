export type LogLevel = "debug" | "info" | "warn" | "error";

export interface Logger {
  debug(message: string, fields?: Record<string, unknown>): void;
  info(message: string, fields?: Record<string, unknown>): void;
  warn(message: string, fields?: Record<string, unknown>): void;
  error(message: string, fields?: Record<string, unknown>): void;
  child(fields: Record<string, unknown>): Logger;
}

export const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === "string" && (LOG_LEVELS as readonly string[]).includes(value);
}

export interface CreateLoggerOptions {
  /**
   * Minimum level to emit.
   */
  level?: LogLevel;

  /**
   * Output format.
   */
  format?: "pretty" | "json";

  /**
   * Fields merged into every line, e.g. `{ stage: "dev" }`.
   */
  fields?: Record<string, unknown>;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40
};

function shouldLog(min: LogLevel, lvl: LogLevel): boolean {
  return LEVEL_ORDER[lvl] >= LEVEL_ORDER[min];
}

function safeStringify(value: unknown): string {
  try {
    return JSON.stringify(value);
  } catch {
    return "\"<unstringifiable>\"";
  }
}

/**
 * Creates a minimal logger implementation suitable for CLI + CI usage.
 *
 * `child()` returns a logger with extra bound fields (command, stage).
 *
 * Defaults:
 * - level: "info"
 * - format: "pretty"
 */
export function createLogger(options: CreateLoggerOptions = {}): Logger {
  const level = options.level ?? "info";
  const format = options.format ?? "pretty";
  const bound = options.fields ?? {};

  const emit = (lvl: LogLevel, message: string, fields?: Record<string, unknown>): void => {
    if (!shouldLog(level, lvl)) return;

    const payload = { ...bound, ...(fields ?? {}) };
    if (format === "json") {
      const line = {
        ts: new Date().toISOString(),
        level: lvl,
        msg: message,
        ...payload
      };
      const out = JSON.stringify(line);
      if (lvl === "warn" || lvl === "error") {
        console.error(out);
      } else {
        console.log(out);
      }
      return;
    }

    const suffix = Object.keys(payload).length ? ` ${safeStringify(payload)}` : "";
    const out = `[${lvl}] ${message}${suffix}`;
    if (lvl === "warn" || lvl === "error") {
      console.error(out);
    } else {
      console.log(out);
    }
  };

  return {
    debug: (m, f) => emit("debug", m, f),
    info: (m, f) => emit("info", m, f),
    warn: (m, f) => emit("warn", m, f),
    error: (m, f) => emit("error", m, f),
    child: (fields) => createLogger({ level, format, fields: { ...bound, ...fields } })
  };
}

/**
 * Logger that drops everything. Used as the default collaborator in library
 * entry points and tests.
 */
export const silentLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
  child: () => silentLogger
};

/**
 * Builds the CLI logger from `LOG_LEVEL` / `LOG_FORMAT`.
 */
export function createLoggerFromEnv(env: NodeJS.ProcessEnv = process.env): Logger {
  return createLogger({
    level: isLogLevel(env.LOG_LEVEL) ? env.LOG_LEVEL : "info",
    format: env.LOG_FORMAT === "json" ? "json" : "pretty"
  });
}
