type LogLevel = "debug" | "info" | "warn" | "error";

type LogMeta = Record<string, unknown>;

export interface Logger {
  debug: (message: string, meta?: LogMeta) => void;
  info: (message: string, meta?: LogMeta) => void;
  warn: (message: string, meta?: LogMeta) => void;
  error: (message: string, meta?: LogMeta) => void;
  child: (scope: string) => Logger;
}

const levelOrder: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

const resolveLevel = (): LogLevel => {
  const raw = (process.env.LOG_LEVEL ?? "").toLowerCase();
  if (raw === "debug" || raw === "info" || raw === "warn" || raw === "error") {
    return raw;
  }
  return process.env.NODE_ENV === "production" ? "info" : "debug";
};

const activeLevel = resolveLevel();

const TOKEN_PATTERN = /\b\d{6,12}:[A-Za-z0-9_-]{30,}\b/g;
const SENSITIVE_KEY = /token|secret|password/i;

export const maskSecrets = (value: string): string => value.replace(TOKEN_PATTERN, "***:***");

const sanitizeMeta = (meta: LogMeta): LogMeta => {
  const clean: LogMeta = {};
  for (const [key, value] of Object.entries(meta)) {
    if (SENSITIVE_KEY.test(key)) {
      clean[key] = "***";
    } else if (typeof value === "string") {
      clean[key] = maskSecrets(value);
    } else {
      clean[key] = value;
    }
  }
  return clean;
};

const write = (level: LogLevel, scope: string, message: string, meta?: LogMeta): void => {
  if (levelOrder[level] < levelOrder[activeLevel]) return;
  const payload = {
    ts: new Date().toISOString(),
    level,
    scope,
    msg: maskSecrets(message),
    ...(meta ? { meta: sanitizeMeta(meta) } : {}),
  };
  const line = `${JSON.stringify(payload)}\n`;
  if (level === "error" || level === "warn") {
    process.stderr.write(line);
    return;
  }
  process.stdout.write(line);
};

export const createLogger = (scope: string): Logger => ({
  debug: (message, meta) => write("debug", scope, message, meta),
  info: (message, meta) => write("info", scope, message, meta),
  warn: (message, meta) => write("warn", scope, message, meta),
  error: (message, meta) => write("error", scope, message, meta),
  child: (childScope) => createLogger(`${scope}.${childScope}`),
});

export const logger = createLogger("bot");
