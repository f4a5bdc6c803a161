import type { AudioInputPort } from "../ports/audio/AudioInputPort";
import type { ServerLinkPort } from "../ports/net/ServerLinkPort";
import type { LoggerPort } from "../ports/sys/LoggerPort";
import type { TranscriptAggregator } from "../domain/transcript/TranscriptAggregator";
import { describeError } from "../domain/errors";
import { encodeEof } from "../shared/protocol";
import { FrameRelay } from "./FrameRelay";

export type RecordingStateValue = "STOPPED" | "RECORDING";

export interface RecordingControllerOptions {
  queueCapacity?: number;
}

/**
 * Starts and stops capture and relays frames to the server. `eof` always goes
 * out after the last frame captured before `stop()`; frames arriving after
 * `stop()` are dropped.
 */
export class RecordingController {
  private current: RecordingStateValue = "STOPPED";
  private readonly relay: FrameRelay;
  private removeChunkHandler: (() => void) | null = null;
  private transitions: Promise<void> = Promise.resolve();

  constructor(
    private readonly audioIn: AudioInputPort,
    private readonly link: ServerLinkPort,
    private readonly transcript: TranscriptAggregator,
    private readonly logger: LoggerPort,
    options: RecordingControllerOptions = {}
  ) {
    this.relay = new FrameRelay((frame) => this.link.sendAudio(frame), logger, options.queueCapacity);
  }

  get state(): RecordingStateValue {
    return this.current;
  }

  get isRecording(): boolean {
    return this.current === "RECORDING";
  }

  start(): Promise<void> {
    return this.enqueue(() => this.doStart());
  }

  stop(): Promise<void> {
    return this.enqueue(() => this.doStop());
  }

  toggle(): Promise<void> {
    return this.enqueue(() => (this.current === "RECORDING" ? this.doStop() : this.doStart()));
  }

  private enqueue(step: () => Promise<void>): Promise<void> {
    const next = this.transitions.then(step);
    this.transitions = next.catch((err) => {
      this.logger.error("Recording transition failed.", { detail: describeError(err) });
    });
    return next;
  }

  private async doStart() {
    if (this.current === "RECORDING") return;

    this.current = "RECORDING";
    this.transcript.reset();
    this.removeChunkHandler = this.audioIn.onChunk((chunk) => {
      if (this.current !== "RECORDING") return;
      this.relay.push(chunk);
    });

    try {
      await this.audioIn.start();
    } catch (err) {
      this.current = "STOPPED";
      this.unhook();
      throw err;
    }
    this.logger.info("Recording started.");
  }

  private async doStop() {
    if (this.current === "STOPPED") return;

    // Closing the gate first keeps late device callbacks off the wire.
    this.current = "STOPPED";
    this.unhook();

    try {
      await this.audioIn.stop();
    } catch (err) {
      this.logger.warn("Failed to stop audio capture cleanly.", { detail: describeError(err) });
    }

    await this.relay.drain();
    await this.link.sendControl(encodeEof());
    this.logger.info("Recording stopped.", { droppedFrames: this.relay.dropped });
  }

  private unhook() {
    this.removeChunkHandler?.();
    this.removeChunkHandler = null;
  }
}
