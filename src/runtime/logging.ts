import { createWriteStream, existsSync, mkdirSync, renameSync, statSync, unlinkSync, type WriteStream } from "fs";
import path from "path";

export interface LoggingHandle {
  readonly logPath?: string;
  /** Restores the console and resolves once the file is flushed. */
  shutdown(): Promise<void>;
}

export interface LoggingOptions {
  /** Banner name written at session start/end. */
  program?: string;
  maxBytes?: number;
  backupCount?: number;
}

export const DEFAULT_LOG_MAX_BYTES = 10 * 1024 * 1024;
export const DEFAULT_LOG_BACKUPS = 5;

/** Shifts `file` -> `file.1` -> ... -> `file.N`; the oldest backup is deleted. */
export function rotateLogFile(file: string, backupCount: number): void {
  if (!existsSync(file)) return;
  if (backupCount <= 0) {
    unlinkSync(file);
    return;
  }
  const oldest = `${file}.${backupCount}`;
  if (existsSync(oldest)) unlinkSync(oldest);
  for (let i = backupCount - 1; i >= 1; i--) {
    const source = `${file}.${i}`;
    if (existsSync(source)) renameSync(source, `${file}.${i + 1}`);
  }
  renameSync(file, `${file}.1`);
}

function fileSize(file: string): number {
  return existsSync(file) ? statSync(file).size : 0;
}

function stringify(arg: unknown): string {
  if (typeof arg === "string") return arg;
  if (arg instanceof Error) return arg.stack ?? arg.message;
  try {
    return JSON.stringify(arg);
  } catch {
    return String(arg);
  }
}

/** Mirrors console output into `logFile`, rotating it once it grows past `maxBytes`. */
export function initializeLogging(logFile?: string, options: LoggingOptions = {}): LoggingHandle {
  if (!logFile) {
    return {
      shutdown: () => Promise.resolve(),
    };
  }

  const program = options.program ?? "transcribe";
  const maxBytes = options.maxBytes ?? DEFAULT_LOG_MAX_BYTES;
  const backupCount = options.backupCount ?? DEFAULT_LOG_BACKUPS;

  const resolvedLog = path.resolve(logFile);
  const logDir = path.dirname(resolvedLog);
  if (!existsSync(logDir)) {
    mkdirSync(logDir, { recursive: true });
  }

  if (fileSize(resolvedLog) >= maxBytes) {
    rotateLogFile(resolvedLog, backupCount);
  }

  let stream: WriteStream = createWriteStream(resolvedLog, { flags: "a" });
  let written = fileSize(resolvedLog);

  const writeLine = (line: string) => {
    const bytes = Buffer.byteLength(line);
    if (written > 0 && written + bytes > maxBytes) {
      stream.end();
      rotateLogFile(resolvedLog, backupCount);
      stream = createWriteStream(resolvedLog, { flags: "a" });
      written = 0;
    }
    stream.write(line);
    written += bytes;
  };

  writeLine(`[${new Date().toISOString()}] --- ${program} session started ---\n`);

  const original = {
    log: console.log.bind(console),
    debug: console.debug.bind(console),
    info: console.info.bind(console),
    warn: console.warn.bind(console),
    error: console.error.bind(console),
  };

  const mirror = (level: keyof typeof original) =>
    (...args: unknown[]) => {
      original[level](...args);
      try {
        const timestamp = new Date().toISOString();
        const message = args.map(stringify).join(" ");
        writeLine(`[${timestamp}] ${level.toUpperCase()} ${message}\n`);
      } catch (err) {
        original.error("Failed to write log file:", err);
      }
    };

  console.log = mirror("log");
  console.debug = mirror("debug");
  console.info = mirror("info");
  console.warn = mirror("warn");
  console.error = mirror("error");

  let closing: Promise<void> | null = null;
  const shutdown = () => {
    if (closing) return closing;
    console.log = original.log;
    console.debug = original.debug;
    console.info = original.info;
    console.warn = original.warn;
    console.error = original.error;
    const last = stream;
    closing = new Promise<void>((resolve) => {
      last.once("error", (err) => {
        original.error("Failed to write log file:", err);
        resolve();
      });
      last.end(`[${new Date().toISOString()}] --- ${program} session ended ---\n`, () => resolve());
    });
    return closing;
  };

  return {
    logPath: resolvedLog,
    shutdown,
  };
}
