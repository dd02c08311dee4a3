/**
 * Leveled console logging.
 *
 * Everything goes to stderr so command output on stdout stays parseable.
 * The level comes from ITEMFLOW_LOG_LEVEL (or DEBUG) and can be changed at
 * run time by the CLI's --verbose and --quiet flags.
 */

export type LogLevel = "debug" | "info" | "message" | "warning" | "error";

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  message: 30,
  warning: 40,
  error: 50,
};

export function isLogLevel(value: string): value is LogLevel {
  return value in LEVEL_ORDER;
}

function initialLevel(): LogLevel {
  const fromEnv = process.env.ITEMFLOW_LOG_LEVEL?.toLowerCase();
  if (fromEnv && isLogLevel(fromEnv)) return fromEnv;
  if (process.env.DEBUG) return "debug";
  return "message";
}

let currentLevel: LogLevel = initialLevel();

export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

export function getLogLevel(): LogLevel {
  return currentLevel;
}

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  message(message: string): void;
  warn(message: string): void;
  error(message: string, err?: unknown): void;
}

function enabled(level: LogLevel): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[currentLevel];
}

export function getLogger(scope: string): Logger {
  return {
    debug(message) {
      if (enabled("debug")) console.error(`[${scope}] ${message}`);
    },
    info(message) {
      if (enabled("info")) console.error(message);
    },
    message(message) {
      if (enabled("message")) console.error(message);
    },
    warn(message) {
      if (enabled("warning")) console.error(`Warning: ${message}`);
    },
    error(message, err) {
      if (!enabled("error")) return;
      console.error(`Error: ${message}`);
      if (err !== undefined && enabled("debug")) console.error(err);
    },
  };
}
