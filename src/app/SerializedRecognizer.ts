import PQueue from "p-queue";
import type { RecognizerPort } from "../ports/speech/RecognizerPort";

/**
 * Single-slot gate around the one shared recognizer. At most one recognition
 * runs process-wide, so one session's backlog delays every other session.
 */
export class SerializedRecognizer implements RecognizerPort {
  private readonly queue = new PQueue({ concurrency: 1 });

  constructor(private readonly inner: RecognizerPort) {}

  get waiting(): number {
    return this.queue.size;
  }

  recognize(samples: Float32Array, sampleRate: number): Promise<unknown> {
    return this.queue.add(() => this.inner.recognize(samples, sampleRate));
  }
}
