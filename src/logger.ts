/**
 * Logging for lesson-list.
 *
 * The list owns the terminal, so logs never go to stdout/stderr: `initLogger`
 * points pino at a log file. Until then every logger is silent, which keeps
 * library use and tests quiet.
 */
import pino from "pino";

export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal" | "silent";

export interface LoggerOptions {
  level?: LogLevel;
  /** Log file path; created (with its directory) if missing. */
  destination: string;
}

let root: pino.Logger = pino({ level: "silent" });

export function initLogger(options: LoggerOptions): pino.Logger {
  root = pino(
    {
      level: options.level ?? "info",
      name: "lesson-list",
      timestamp: pino.stdTimeFunctions.isoTime,
      formatters: {
        level: (label) => ({ level: label }),
      },
    },
    pino.destination({ dest: options.destination, mkdir: true, sync: true }),
  );
  return root;
}

/**
 * Component logger. Resolves the root lazily so loggers created at import
 * time still pick up `initLogger`.
 */
export function createLogger(component: string) {
  return {
    debug: (msg: string, data?: Record<string, unknown>) => root.child({ component }).debug(data ?? {}, msg),
    info: (msg: string, data?: Record<string, unknown>) => root.child({ component }).info(data ?? {}, msg),
    warn: (msg: string, data?: Record<string, unknown>) => root.child({ component }).warn(data ?? {}, msg),
    error: (msg: string, err?: unknown) =>
      root.child({ component }).error(err instanceof Error ? { err } : { detail: err }, msg),
  };
}
