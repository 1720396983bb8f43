type LogMeta = Record<string, unknown>;
type Level = "debug" | "info" | "warn" | "error";

const SERVICE_NAME = "community-service";

const LEVEL_ORDER: Record<Level, number> = { debug: 10, info: 20, warn: 30, error: 40 };

const SENSITIVE_KEY =
  /password|secret|token|authorization|bearer|cookie|api[_-]?key|hash$/i;
const JWT_PATTERN = /eyJ[a-zA-Z0-9_-]*\.[a-zA-Z0-9_-]+\.[a-zA-Z0-9_-]+/g;

const minimumLevel = (): Level => {
  const configured = process.env.LOG_LEVEL;
  if (configured === "debug" || configured === "info" || configured === "warn" || configured === "error") {
    return configured;
  }
  return process.env.NODE_ENV === "test" ? "warn" : "info";
};

const redactString = (value: string) => {
  if (value.toLowerCase().startsWith("bearer ")) {
    return "Bearer [redacted]";
  }
  return value.replace(JWT_PATTERN, "[redacted]");
};

export const redact = (value: unknown, depth = 0): unknown => {
  if (depth > 4) {
    return "[redacted]";
  }
  if (Array.isArray(value)) {
    return value.map((entry) => redact(entry, depth + 1));
  }
  if (value instanceof Error) {
    return { name: value.name, message: redactString(value.message) };
  }
  if (typeof value === "string") {
    return redactString(value);
  }
  if (value && typeof value === "object") {
    const result: Record<string, unknown> = {};
    for (const [key, entry] of Object.entries(value)) {
      result[key] = SENSITIVE_KEY.test(key) ? "[redacted]" : redact(entry, depth + 1);
    }
    return result;
  }
  return value;
};

const write = (level: Level, event: string, meta?: LogMeta) => {
  if (LEVEL_ORDER[level] < LEVEL_ORDER[minimumLevel()]) {
    return;
  }
  const safeMeta = meta ? redact(meta) : undefined;
  const payload = {
    level,
    service: SERVICE_NAME,
    event,
    time: new Date().toISOString(),
    ...(safeMeta && typeof safeMeta === "object" ? safeMeta : {})
  };
  const line = JSON.stringify(payload);
  if (level === "error") {
    console.error(line);
    return;
  }
  if (level === "warn") {
    console.warn(line);
    return;
  }
  console.log(line);
};

export const log = {
  debug: (event: string, meta?: LogMeta) => write("debug", event, meta),
  info: (event: string, meta?: LogMeta) => write("info", event, meta),
  warn: (event: string, meta?: LogMeta) => write("warn", event, meta),
  error: (event: string, meta?: LogMeta) => write("error", event, meta)
};
