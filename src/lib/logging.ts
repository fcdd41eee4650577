export type LogValue = unknown;

type LogLevel = "info" | "warn" | "error";

const levelRank: Record<LogLevel | "silent", number> = {
  info: 10,
  warn: 20,
  error: 30,
  silent: 100
};

function resolveThreshold(): number {
  const configured = String(process.env.MENDWORKS_LOG_LEVEL || "").trim().toLowerCase();
  if (configured === "warn" || configured === "error" || configured === "silent" || configured === "info") {
    return levelRank[configured];
  }

  return levelRank.info;
}

export function formatLogLine(level: LogLevel, event: string, fields: Record<string, LogValue>): string {
  return JSON.stringify({
    level,
    event,
    timestamp: new Date().toISOString(),
    ...fields
  });
}

function emit(level: LogLevel, event: string, fields: Record<string, LogValue>): void {
  if (levelRank[level] < resolveThreshold()) {
    return;
  }

  const serialized = formatLogLine(level, event, fields);

  if (level === "error") {
    console.error(serialized);
    return;
  }

  console.log(serialized);
}

export function logInfo(event: string, fields: Record<string, LogValue> = {}): void {
  emit("info", event, fields);
}

export function logWarn(event: string, fields: Record<string, LogValue> = {}): void {
  emit("warn", event, fields);
}

export function logError(event: string, fields: Record<string, LogValue> = {}): void {
  emit("error", event, fields);
}

export function serializeError(error: unknown): Record<string, unknown> {
  if (error instanceof Error) {
    return {
      message: error.message,
      stack: error.stack
    };
  }

  return {
    message: String(error)
  };
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
