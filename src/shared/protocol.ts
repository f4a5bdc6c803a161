import { ProtocolError } from "../domain/errors";

export const DEFAULT_SAMPLE_RATE = 16000;

export interface Segment {
  text: string;
  startTime: number;
  endTime: number;
}

export interface RecognitionResult {
  text: string;
  segments: Segment[];
  error?: string;
}

export type ControlMessage =
  | { type: "config"; sampleRate: number }
  | { type: "eof" }
  | { type: "unknown"; name: string };

// Wire shapes, snake_case as sent over the socket.
interface ConfigFrame {
  type: "config";
  sample_rate: number;
}

interface EofFrame {
  type: "eof";
}

export interface ResultFrame {
  text: string;
  timestamps: Array<{ text: string; start: number; end: number }>;
  error?: string;
}

export function emptyResult(error?: string): RecognitionResult {
  return error === undefined ? { text: "", segments: [] } : { text: "", segments: [], error };
}

export function encodeConfig(sampleRate: number): string {
  const frame: ConfigFrame = { type: "config", sample_rate: sampleRate };
  return JSON.stringify(frame);
}

export function encodeEof(): string {
  const frame: EofFrame = { type: "eof" };
  return JSON.stringify(frame);
}

export function decodeControl(text: string): ControlMessage {
  const payload = parseJsonObject(text, "control message");
  const type = payload.type;

  if (typeof type !== "string") {
    throw new ProtocolError("Control message is missing a string \"type\" field.");
  }

  if (type === "eof") {
    return { type: "eof" };
  }

  if (type === "config") {
    const raw = payload.sample_rate;
    if (raw === undefined || raw === null) {
      return { type: "config", sampleRate: DEFAULT_SAMPLE_RATE };
    }
    if (typeof raw !== "number" || !Number.isInteger(raw) || raw <= 0) {
      throw new ProtocolError(`Invalid sample_rate in config message: ${JSON.stringify(raw)}`);
    }
    return { type: "config", sampleRate: raw };
  }

  return { type: "unknown", name: type };
}

export function encodeResult(result: RecognitionResult): string {
  const frame: ResultFrame = {
    text: result.text,
    timestamps: result.segments.map((segment) => ({
      text: segment.text,
      start: segment.startTime,
      end: segment.endTime,
    })),
  };
  if (result.error !== undefined) {
    frame.error = result.error;
  }
  return JSON.stringify(frame);
}

export function decodeResult(text: string): RecognitionResult {
  const payload = parseJsonObject(text, "result message");

  if (typeof payload.text !== "string") {
    throw new ProtocolError("Result message is missing a string \"text\" field.");
  }

  const segments: Segment[] = [];
  if (Array.isArray(payload.timestamps)) {
    for (const entry of payload.timestamps) {
      if (
        isRecord(entry) &&
        typeof entry.text === "string" &&
        typeof entry.start === "number" &&
        typeof entry.end === "number"
      ) {
        segments.push({ text: entry.text, startTime: entry.start, endTime: entry.end });
      }
    }
  }

  const result: RecognitionResult = { text: payload.text, segments };
  if (typeof payload.error === "string") {
    result.error = payload.error;
  }
  return result;
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function parseJsonObject(text: string, what: string): Record<string, unknown> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (err) {
    throw new ProtocolError(`Malformed ${what}: not valid JSON.`, { cause: err });
  }
  if (!isRecord(parsed)) {
    throw new ProtocolError(`Malformed ${what}: expected a JSON object.`);
  }
  return parsed;
}
