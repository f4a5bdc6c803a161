import type { TimePort } from "../../ports/sys/TimePort";

export interface TranscriptSnapshot {
  currentText: string;
  accumulatedText: string;
  sessionStartTime: number;
}

/**
 * Merges successive partial results into one running transcript.
 *
 * Dedup is a suffix/substring check, not a diff: a phrase that legitimately
 * recurs later in the session is dropped, and texts differing only in
 * punctuation are both kept. A partial that extends the whole transcript so far
 * replaces it rather than repeating it.
 */
export class TranscriptAggregator {
  private current = "";
  private accumulated = "";
  private startedAt = 0;

  constructor(private readonly time: TimePort) {}

  get currentText(): string {
    return this.current;
  }

  get accumulatedText(): string {
    return this.accumulated;
  }

  get sessionStartTime(): number {
    return this.startedAt;
  }

  /** Returns true when the accumulated transcript grew. */
  onResult(text: string): boolean {
    if (!text) return false;

    this.current = text;
    if (this.accumulated.endsWith(text) || this.accumulated.includes(text)) {
      return false;
    }

    if (this.accumulated && text.startsWith(this.accumulated)) {
      this.accumulated = text;
      return true;
    }

    this.accumulated = this.accumulated ? `${this.accumulated} ${text}` : text;
    return true;
  }

  reset(): void {
    this.current = "";
    this.accumulated = "";
    this.startedAt = this.time.now();
  }

  snapshot(): TranscriptSnapshot {
    return {
      currentText: this.current,
      accumulatedText: this.accumulated,
      sessionStartTime: this.startedAt,
    };
  }
}
