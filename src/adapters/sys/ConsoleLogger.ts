import type { LogMeta, LoggerPort } from "../../ports/sys/LoggerPort";

export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

export function parseLogLevel(value: string | undefined, fallback: LogLevel = "info"): LogLevel {
  const normalized = value?.trim().toLowerCase();
  if (normalized === "debug" || normalized === "info" || normalized === "warn" || normalized === "error") {
    return normalized;
  }
  return fallback;
}

function format(scope: string | undefined, message: string, meta?: LogMeta): string {
  const prefix = scope ? `[${scope}] ${message}` : message;
  if (!meta) return prefix;
  const defined = Object.entries(meta).filter(([, value]) => value !== undefined);
  if (!defined.length) return prefix;
  return `${prefix} ${safeStringify(Object.fromEntries(defined))}`;
}

function safeStringify(value: unknown): string {
  try {
    return JSON.stringify(value, (_key, v: unknown) => (typeof v === "bigint" ? v.toString() : v));
  } catch {
    return String(value);
  }
}

export class ConsoleLogger implements LoggerPort {
  constructor(
    private readonly scope?: string,
    private readonly minLevel: LogLevel = "info"
  ) {}

  child(scope: string): ConsoleLogger {
    return new ConsoleLogger(this.scope ? `${this.scope}:${scope}` : scope, this.minLevel);
  }

  debug(message: string, meta?: LogMeta): void {
    this.log("debug", message, meta);
  }
  info(message: string, meta?: LogMeta): void {
    this.log("info", message, meta);
  }
  warn(message: string, meta?: LogMeta): void {
    this.log("warn", message, meta);
  }
  error(message: string, meta?: LogMeta): void {
    this.log("error", message, meta);
  }

  private log(level: LogLevel, message: string, meta?: LogMeta) {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[this.minLevel]) return;
    const payload = format(this.scope, message, meta);
    switch (level) {
      case "debug":
        return console.debug(payload);
      case "info":
        return console.info(payload);
      case "warn":
        return console.warn(payload);
      case "error":
        return console.error(payload);
    }
  }
}
