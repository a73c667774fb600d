export type LogLevel = "debug" | "info" | "warn" | "error";

export type LogContext = Record<string, unknown>;

export interface ILogger {
  debug(message: string, meta?: LogContext): void;
  info(message: string, meta?: LogContext): void;
  warn(message: string, meta?: LogContext, error?: unknown): void;
  error(message: string, meta?: LogContext, error?: unknown): void;
  child(component: string): ILogger;
}

type LogEntry = {
  timestamp: string;
  level: LogLevel;
  service: string;
  component?: string;
  message: string;
  error?: { name: string; message: string; stack?: string };
  [key: string]: unknown;
};

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3
};

const LOG_COLORS: Record<LogLevel, string> = {
  debug: "\x1b[36m",
  info: "\x1b[32m",
  warn: "\x1b[33m",
  error: "\x1b[31m"
};

const RESET = "\x1b[0m";
const DIM = "\x1b[2m";

const isLogLevel = (value: string): value is LogLevel => Object.hasOwn(LOG_LEVELS, value);

const minimumLevel = (): LogLevel => {
  const level = process.env.LOG_LEVEL?.toLowerCase() ?? "";
  return isLogLevel(level) ? level : "info";
};

const logFormat = (): "json" | "pretty" => {
  const format = process.env.LOG_FORMAT?.toLowerCase();
  if (format === "json" || format === "pretty") return format;
  return process.env.NODE_ENV === "production" ? "json" : "pretty";
};

const formatError = (error: unknown): LogEntry["error"] => {
  if (error instanceof Error) {
    return { name: error.name, message: error.message, stack: error.stack };
  }
  return { name: "UnknownError", message: String(error) };
};

const formatPretty = (entry: LogEntry) => {
  const { timestamp, level, service, component, message, error, ...meta } = entry;
  const scope = component ? `${service}:${component}` : service;
  const metaStr = Object.keys(meta).length > 0 ? ` ${DIM}${JSON.stringify(meta)}${RESET}` : "";
  const errorStr = error ? `\n  ${DIM}${error.stack ?? error.message}${RESET}` : "";
  return `${DIM}${timestamp}${RESET} ${LOG_COLORS[level]}${level.toUpperCase().padEnd(5)}${RESET} ${DIM}[${scope}]${RESET} ${message}${metaStr}${errorStr}`;
};

// Log lines go to stderr so CLI output on stdout stays clean.
const output = (entry: LogEntry) => {
  const line = logFormat() === "json" ? JSON.stringify(entry) : formatPretty(entry);
  console.error(line);
};

export class Logger implements ILogger {
  constructor(
    private readonly service: string,
    private readonly component?: string
  ) {}

  private log(level: LogLevel, message: string, meta?: LogContext, error?: unknown) {
    if (LOG_LEVELS[level] < LOG_LEVELS[minimumLevel()]) return;
    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      service: this.service,
      message,
      ...meta
    };
    if (this.component) entry.component = this.component;
    if (error !== undefined) entry.error = formatError(error);
    output(entry);
  }

  debug(message: string, meta?: LogContext) {
    this.log("debug", message, meta);
  }

  info(message: string, meta?: LogContext) {
    this.log("info", message, meta);
  }

  warn(message: string, meta?: LogContext, error?: unknown) {
    this.log("warn", message, meta, error);
  }

  error(message: string, meta?: LogContext, error?: unknown) {
    this.log("error", message, meta, error);
  }

  child(component: string): ILogger {
    return new Logger(this.service, this.component ? `${this.component}:${component}` : component);
  }
}

export const createLogger = (service: string): ILogger => new Logger(service);

export const logger = createLogger("isin-codes");
