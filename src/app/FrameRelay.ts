import type { LoggerPort } from "../ports/sys/LoggerPort";
import { describeError } from "../domain/errors";

export type FrameSink = (frame: Buffer) => Promise<void>;

export const DEFAULT_RELAY_CAPACITY = 64;

/**
 * Bounded hand-off between the capture side and the network sender. `push`
 * never waits; frames are sent strictly in push order. When the sender falls
 * behind by `capacity` frames, new frames are dropped.
 */
export class FrameRelay {
  private tail: Promise<void> = Promise.resolve();
  private inFlight = 0;
  private droppedFrames = 0;

  constructor(
    private readonly sink: FrameSink,
    private readonly logger: LoggerPort,
    private readonly capacity = DEFAULT_RELAY_CAPACITY
  ) {}

  get pending(): number {
    return this.inFlight;
  }

  get dropped(): number {
    return this.droppedFrames;
  }

  push(frame: Buffer): boolean {
    if (this.inFlight >= this.capacity) {
      this.droppedFrames += 1;
      this.logger.warn("Send queue full; dropping audio frame.", {
        bytes: frame.length,
        dropped: this.droppedFrames,
      });
      return false;
    }

    this.inFlight += 1;
    this.tail = this.tail
      .then(() => this.sink(frame))
      .catch((err) => {
        this.logger.error("Failed to send audio frame.", { detail: describeError(err) });
      })
      .finally(() => {
        this.inFlight -= 1;
      });
    return true;
  }

  /** Resolves after every frame pushed so far has been handed to the sink. */
  drain(): Promise<void> {
    return this.tail;
  }
}
