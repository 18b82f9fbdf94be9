export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVELS: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

let threshold: LogLevel = "info";

export function setLogLevel(level: LogLevel) {
  threshold = level;
}

export function logEvent(params: {
  level?: LogLevel;
  event: string;
  message: string;
  ip?: string;
  meta?: Record<string, unknown>;
}) {
  const level = params.level ?? "info";
  if (LEVELS[level] < LEVELS[threshold]) {
    return;
  }

  const payload = {
    timestamp: new Date().toISOString(),
    level,
    event: params.event,
    message: params.message,
    ip: params.ip,
    meta: params.meta,
  };

  const line = JSON.stringify(payload);
  if (level === "error") {
    console.error(line);
  } else if (level === "warn") {
    console.warn(line);
  } else {
    console.info(line);
  }
}
