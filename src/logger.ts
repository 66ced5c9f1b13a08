// Console-backed logging shared by the relay server and the display client.

export interface Logger {
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
  debug(message: string, ...args: unknown[]): void;
}

export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

function isLogLevel(value: string): value is LogLevel {
  return value in LEVEL_ORDER;
}

/** Read LOG_LEVEL from the environment; unknown values fall back to "info". */
export function resolveLogLevel(env: NodeJS.ProcessEnv = process.env): LogLevel {
  const raw = (env.LOG_LEVEL ?? "").toLowerCase();
  return isLogLevel(raw) ? raw : "info";
}

const ts = () => new Date().toISOString();

/**
 * Create a logger whose lines read `[LEVEL] [timestamp] [scope] message`.
 * Messages below `level` are dropped.
 */
export function createLogger(scope: string, level: LogLevel = resolveLogLevel()): Logger {
  const enabled = (candidate: LogLevel) => LEVEL_ORDER[candidate] >= LEVEL_ORDER[level];
  const prefix = (tag: string) => `[${tag}] [${ts()}] [${scope}]`;

  return {
    info: (msg, ...args) => {
      if (enabled("info")) console.log(`${prefix("INFO")} ${msg}`, ...args);
    },
    warn: (msg, ...args) => {
      if (enabled("warn")) console.warn(`${prefix("WARN")} ${msg}`, ...args);
    },
    error: (msg, ...args) => {
      if (enabled("error")) console.error(`${prefix("ERROR")} ${msg}`, ...args);
    },
    debug: (msg, ...args) => {
      if (enabled("debug")) console.debug(`${prefix("DEBUG")} ${msg}`, ...args);
    },
  };
}

/** Logger that discards everything. */
export function createSilentLogger(): Logger {
  const noop = () => {};
  return { info: noop, warn: noop, error: noop, debug: noop };
}
