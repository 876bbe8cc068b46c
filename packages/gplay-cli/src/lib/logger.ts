export type LogLevel = "debug" | "info" | "warn" | "error";

export type LogMeta = Record<string, unknown>;

export interface LoggerOptions {
  level: LogLevel;
  json: boolean;
}

export interface Logger {
  debug(message: string, meta?: LogMeta): void;
  info(message: string, meta?: LogMeta): void;
  warn(message: string, meta?: LogMeta): void;
  error(message: string, meta?: LogMeta): void;
  child(defaultMeta: LogMeta): Logger;
}

const SEVERITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const SECRET_KEY = /token|secret|authorization|private_key|password/i;

export const REDACTED = "[redacted]";

/**
 * Replace the values of credential-like keys, at any depth.
 */
export function redact(meta: LogMeta): LogMeta {
  const walk = (value: unknown): unknown => {
    if (Array.isArray(value)) return value.map(walk);
    if (typeof value !== "object" || value === null) return value;
    return Object.fromEntries(
      Object.entries(value).map(([key, inner]) => [key, SECRET_KEY.test(key) ? REDACTED : walk(inner)])
    );
  };
  return Object.fromEntries(
    Object.entries(meta).map(([key, value]) => [key, SECRET_KEY.test(key) ? REDACTED : walk(value)])
  );
}

function format(json: boolean, level: LogLevel, message: string, meta: LogMeta): string {
  const timestamp = new Date().toISOString();
  if (json) {
    return JSON.stringify({ timestamp, level, message, ...meta });
  }
  const suffix = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : "";
  return `[${timestamp}] ${level.toUpperCase().padEnd(5)} ${message}${suffix}`;
}

/**
 * Structured logger on stderr. stdout is left to command output so that
 * `gplay ... --debug | jq` still parses.
 */
export function createLogger({ level, json }: LoggerOptions): Logger {
  const threshold = SEVERITY[level];

  const build = (base: LogMeta): Logger => {
    const emit = (at: LogLevel) => (message: string, meta: LogMeta = {}) => {
      if (SEVERITY[at] < threshold) return;
      console.error(format(json, at, message, redact({ ...base, ...meta })));
    };
    return {
      debug: emit("debug"),
      info: emit("info"),
      warn: emit("warn"),
      error: emit("error"),
      child: (meta) => build({ ...base, ...meta }),
    };
  };

  return build({});
}

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

/**
 * Logger for the current process: debug level with --debug / GPLAY_DEBUG,
 * JSON lines with GPLAY_LOG_FORMAT=json.
 */
export function createCliLogger(debug: boolean, env: NodeJS.ProcessEnv = process.env): Logger {
  return createLogger({
    level: debug ? "debug" : "warn",
    json: env.GPLAY_LOG_FORMAT?.trim().toLowerCase() === "json",
  });
}
