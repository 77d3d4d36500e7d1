export type LogLevel = "debug" | "info" | "warn" | "error";

export type LogFields = Record<string, unknown>;

export type Logger = (level: LogLevel, message: string, fields?: LogFields) => void;

export type LoggerOptions = {
  level?: LogLevel;
};

export type LogEntry = {
  level: LogLevel;
  message: string;
  fields: LogFields;
};

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export function createLogger(scope: string, options: LoggerOptions = {}): Logger {
  const threshold = LEVEL_ORDER[options.level ?? "info"];
  return (level, message, fields) => {
    if (LEVEL_ORDER[level] < threshold) return;
    const timestamp = new Date().toISOString();
    const suffix = formatFields(fields);
    const line = `[${timestamp}][${scope}][${level.toUpperCase()}] ${message}${suffix}`;
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
}

export type MemoryLogger = Logger & { entries: LogEntry[] };

export function createMemoryLogger(): MemoryLogger {
  const entries: LogEntry[] = [];
  const logger: Logger = (level, message, fields = {}) => {
    entries.push({ level, message, fields });
  };
  return Object.assign(logger, { entries });
}

export function formatFields(fields: LogFields | undefined): string {
  if (!fields) return "";
  const parts = Object.entries(fields)
    .filter(([, value]) => value !== undefined)
    .map(([key, value]) => `${key}=${formatValue(value)}`);
  return parts.length > 0 ? ` ${parts.join(" ")}` : "";
}

function formatValue(value: unknown): string {
  if (typeof value === "string") {
    return /\s/.test(value) ? JSON.stringify(value) : value;
  }
  if (value instanceof Error) return JSON.stringify(value.message);
  if (typeof value === "object" && value !== null) return JSON.stringify(value);
  return String(value);
}
