/**
 * Leveled logger for the client. Writes `[LEVEL] name: message` lines with
 * an optional JSON context, to the console unless a sink is supplied.
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LogContext {
  method?: string;
  url?: string;
  status?: number;
  timeoutS?: number;
  deviceUuid?: string;
  [key: string]: unknown;
}

export type LogSink = (level: LogLevel, line: string) => void;

export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext, err?: unknown): void;
}

export interface LoggerOptions {
  name?: string;
  level?: LogLevel;
  sink?: LogSink;
}

const logLevels: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3
};

export function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(logLevels, value);
}

export function resolveLogLevel(value: string | undefined, fallback: LogLevel = "info"): LogLevel {
  const normalized = (value || "").trim().toLowerCase();
  return isLogLevel(normalized) ? normalized : fallback;
}

function safeStringify(context: LogContext): string {
  try {
    return JSON.stringify(context);
  } catch (err) {
    const fallbackMessage = err instanceof Error ? err.message : "Unable to serialize context";
    return JSON.stringify({
      serializationError: fallbackMessage,
      contextKeys: Object.keys(context)
    });
  }
}

export function formatLine(level: LogLevel, name: string, message: string, context?: LogContext): string {
  const prefix = `[${level.toUpperCase()}] ${name}: ${message}`;
  if (context && Object.keys(context).length > 0) {
    return `${prefix} ${safeStringify(context)}`;
  }
  return prefix;
}

function writeToConsole(level: LogLevel, line: string): void {
  switch (level) {
    case "warn":
      console.warn(line);
      break;
    case "error":
      console.error(line);
      break;
    default:
      console.log(line);
  }
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const name = options.name ?? "openfmb-client";
  const threshold = logLevels[options.level ?? "info"];
  const sink = options.sink ?? writeToConsole;

  const log = (level: LogLevel, message: string, context?: LogContext): void => {
    if (logLevels[level] < threshold) return;
    sink(level, formatLine(level, name, message, context));
  };

  return {
    debug: (message, context) => log("debug", message, context),
    info: (message, context) => log("info", message, context),
    warn: (message, context) => log("warn", message, context),
    error: (message, context, err) => {
      const merged = err instanceof Error ? { ...context, error: err.message } : context;
      log("error", message, merged);
    }
  };
}
