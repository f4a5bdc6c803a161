import type { LoggerPort } from "../ports/sys/LoggerPort";
import { isRecord, type Segment } from "./protocol";

export interface RecognizerOutput {
  text: string;
  segments: Segment[];
}

/**
 * Validates a recognizer payload. Returns null when the payload is not a record,
 * which callers report as "unexpected result shape".
 *
 * `timestamp` entries may be `{ text, timestamp: [start, end] }` records or bare
 * `[start, end]` pairs aligned to the words of `text` (characters when the text
 * has no spaces). Entries that fit neither form are skipped.
 */
export function parseRecognizerOutput(raw: unknown, logger?: LoggerPort): RecognizerOutput | null {
  if (!isRecord(raw)) {
    return null;
  }

  const text = typeof raw.text === "string" ? raw.text : "";
  const segments: Segment[] = [];

  if (!("timestamp" in raw) || raw.timestamp === undefined || raw.timestamp === null) {
    return { text, segments };
  }

  const entries = raw.timestamp;
  if (!Array.isArray(entries)) {
    logger?.warn("Recognizer timestamp data is not a list; ignoring it.", {
      kind: typeof entries,
    });
    return { text, segments };
  }

  const fragments = alignFragments(text, entries.length);

  entries.forEach((entry: unknown, index) => {
    if (isRecord(entry) && typeof entry.text === "string") {
      const range = toRange(entry.timestamp);
      if (range) {
        segments.push({ text: entry.text, startTime: range[0], endTime: range[1] });
        return;
      }
    }

    const range = toRange(entry);
    if (range && fragments) {
      segments.push({ text: fragments[index], startTime: range[0], endTime: range[1] });
      return;
    }

    logger?.warn("Skipping malformed timestamp segment.", { index, entry });
  });

  return { text, segments };
}

function toRange(value: unknown): [number, number] | null {
  if (!Array.isArray(value) || value.length < 2) return null;
  const [start, end] = value;
  if (typeof start !== "number" || typeof end !== "number") return null;
  return [start, end];
}

function alignFragments(text: string, count: number): string[] | null {
  const words = text.split(/\s+/).filter((word) => word.length > 0);
  if (words.length === count) return words;

  const chars = Array.from(text.replace(/\s+/g, ""));
  if (chars.length === count) return chars;

  return null;
}
