export type TranscribeErrorCode =
  | "PROTOCOL_ERROR"
  | "RECOGNIZER_ERROR"
  | "CONNECTION_ERROR"
  | "CONFIG_ERROR";

export abstract class TranscribeError extends Error {
  abstract readonly code: TranscribeErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Malformed control message. The session skips it and keeps going. */
export class ProtocolError extends TranscribeError {
  readonly code = "PROTOCOL_ERROR";
}

/** Recognizer call failed or answered with something we cannot read. */
export class RecognizerError extends TranscribeError {
  readonly code = "RECOGNIZER_ERROR";
}

/** Transport closed or broken; terminal for that session only. */
export class ConnectionError extends TranscribeError {
  readonly code = "CONNECTION_ERROR";
}

/** Invalid startup settings. Only raised before any session exists. */
export class ConfigError extends TranscribeError {
  readonly code = "CONFIG_ERROR";

  constructor(readonly problems: string[]) {
    super(problems.length === 1 ? problems[0] : `Invalid configuration:\n- ${problems.join("\n- ")}`);
  }
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
