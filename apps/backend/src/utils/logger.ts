type LogLevel = "debug" | "info" | "warn" | "error";

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

const isLogLevel = (value: string | undefined): value is LogLevel =>
  value !== undefined && value in LEVEL_ORDER;

const configuredLevel = process.env.LOG_LEVEL?.trim().toLowerCase();
const threshold: LogLevel = isLogLevel(configuredLevel)
  ? configuredLevel
  : process.env.NODE_ENV === "production"
    ? "info"
    : "debug";

const serializeMeta = (meta: Record<string, unknown>) =>
  JSON.stringify(meta, (_key, value: unknown) =>
    value instanceof Error ? { name: value.name, message: value.message } : value,
  );

const log = (level: LogLevel, message: string, meta?: Record<string, unknown>) => {
  if (LEVEL_ORDER[level] < LEVEL_ORDER[threshold]) return;
  const timestamp = new Date().toISOString();
  const payload = meta ? ` ${serializeMeta(meta)}` : "";
  // eslint-disable-next-line no-console
  console[level](`[${timestamp}] [${level.toUpperCase()}] ${message}${payload}`);
};

export const logger = {
  debug: (message: string, meta?: Record<string, unknown>) => log("debug", message, meta),
  info: (message: string, meta?: Record<string, unknown>) => log("info", message, meta),
  warn: (message: string, meta?: Record<string, unknown>) => log("warn", message, meta),
  error: (message: string, meta?: Record<string, unknown>) => log("error", message, meta),
};
