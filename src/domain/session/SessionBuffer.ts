import PQueue from "p-queue";
import type { LoggerPort } from "../../ports/sys/LoggerPort";
import { DEFAULT_SAMPLE_RATE, emptyResult, type RecognitionResult } from "../../shared/protocol";
import { PCM16_BYTES_PER_SAMPLE } from "../../shared/pcm";
import { describeError } from "../errors";

/** ~1s of mono 16-bit audio at 16kHz. */
export const DEFAULT_DISPATCH_THRESHOLD_BYTES = 32000;

export type DispatchFn = (audio: Buffer, sampleRate: number) => Promise<RecognitionResult>;
export type ResultSink = (result: RecognitionResult) => Promise<void> | void;

export interface SessionBufferOptions {
  thresholdBytes?: number;
  sampleRate?: number;
  logger?: LoggerPort;
}

export interface Session {
  readonly id: string;
  readonly sampleRate: number;
  readonly bufferedBytes: number;
}

/**
 * Per-connection audio accumulator. Owns the session's buffer and sample rate;
 * nothing else mutates them. Dispatches run one at a time, in submission order.
 *
 * The threshold is a plain byte count, so a dispatch can cut a word in half.
 */
export class SessionBuffer implements Session {
  private audio = Buffer.alloc(0);
  private rate: number;
  private disposed = false;
  private readonly queue = new PQueue({ concurrency: 1 });
  private readonly thresholdBytes: number;
  private readonly logger?: LoggerPort;

  constructor(
    readonly id: string,
    private readonly dispatch: DispatchFn,
    private readonly sink: ResultSink,
    options: SessionBufferOptions = {}
  ) {
    this.thresholdBytes = options.thresholdBytes ?? DEFAULT_DISPATCH_THRESHOLD_BYTES;
    this.rate = options.sampleRate ?? DEFAULT_SAMPLE_RATE;
    this.logger = options.logger;
  }

  get sampleRate(): number {
    return this.rate;
  }

  get bufferedBytes(): number {
    return this.audio.length;
  }

  get pendingDispatches(): number {
    return this.queue.size + this.queue.pending;
  }

  get isDisposed(): boolean {
    return this.disposed;
  }

  /** Takes effect for the next dispatch; audio already buffered is kept. */
  configure(sampleRate: number): void {
    if (this.disposed) return;
    this.rate = sampleRate;
  }

  /** Returns the dispatch promise when this frame crossed the threshold, else null. */
  append(bytes: Buffer): Promise<RecognitionResult> | null {
    if (this.disposed || bytes.length === 0) return null;

    this.audio = this.audio.length ? Buffer.concat([this.audio, bytes]) : Buffer.from(bytes);
    if (this.audio.length < this.thresholdBytes) {
      return null;
    }

    this.logger?.debug("Buffer reached dispatch threshold.", {
      sessionId: this.id,
      bytes: this.audio.length,
    });
    return this.submit(false);
  }

  /** Submits whatever is buffered, possibly nothing. */
  flush(): Promise<RecognitionResult> {
    if (this.disposed) {
      return Promise.resolve(emptyResult());
    }
    this.logger?.debug("Flushing session buffer.", {
      sessionId: this.id,
      bytes: this.audio.length,
    });
    return this.submit(true);
  }

  /** Resolves once every queued dispatch has finished. */
  idle(): Promise<void> {
    return this.queue.onIdle();
  }

  /** Discards buffered audio and queued dispatches. A dispatch already running finishes but its result is not delivered. */
  dispose(): void {
    if (this.disposed) return;
    this.disposed = true;
    this.audio = Buffer.alloc(0);
    this.queue.clear();
  }

  private submit(final: boolean): Promise<RecognitionResult> {
    const whole = this.audio.length - (this.audio.length % PCM16_BYTES_PER_SAMPLE);
    const chunk = this.audio.subarray(0, whole);
    const remainder = this.audio.subarray(whole);

    if (final && remainder.length) {
      this.logger?.warn("Dropping incomplete trailing sample on flush.", {
        sessionId: this.id,
        bytes: remainder.length,
      });
    }
    this.audio = final || !remainder.length ? Buffer.alloc(0) : Buffer.from(remainder);

    const sampleRate = this.rate;
    return this.queue.add(() => this.run(chunk, sampleRate));
  }

  private async run(chunk: Buffer, sampleRate: number): Promise<RecognitionResult> {
    let result: RecognitionResult;
    try {
      result = await this.dispatch(chunk, sampleRate);
    } catch (err) {
      result = emptyResult(describeError(err));
    }

    if (this.disposed) {
      return result;
    }

    try {
      await this.sink(result);
    } catch (err) {
      this.logger?.error("Failed to deliver recognition result.", {
        sessionId: this.id,
        detail: describeError(err),
      });
    }
    return result;
  }
}
