import { PvRecorder } from "@picovoice/pvrecorder-node";
import type { AudioInputPort, AudioChunkHandler } from "../../ports/audio/AudioInputPort";
import type { LoggerPort } from "../../ports/sys/LoggerPort";
import { describeError } from "../../domain/errors";

export interface PvRecorderAudioInputOptions {
  deviceLabel?: string;
  /** Samples per frame; PvRecorder always captures 16kHz mono. */
  frameLength: number;
}

export const PV_RECORDER_SAMPLE_RATE = 16000;

export class PvRecorderAudioInput implements AudioInputPort {
  private recorder: PvRecorder | null = null;
  private handlers = new Set<AudioChunkHandler>();
  private loopPromise: Promise<void> | null = null;

  constructor(
    private readonly options: PvRecorderAudioInputOptions,
    private readonly logger: LoggerPort
  ) {}

  async start(): Promise<void> {
    if (this.recorder) return;

    const deviceIndex = resolveAudioDeviceIndex(this.options.deviceLabel, this.logger);
    const recorder = new PvRecorder(this.options.frameLength, deviceIndex);
    recorder.start();
    this.logger.info("Microphone opened.", { device: recorder.getSelectedDevice() });
    this.recorder = recorder;
    this.loopPromise = this.pumpAudio(recorder).catch((err) => {
      this.logger.error("Audio capture loop failed.", { detail: describeError(err) });
    });
  }

  /** Waits for the read loop to exit before releasing the device. */
  async stop(): Promise<void> {
    const recorder = this.recorder;
    if (!recorder) return;
    this.recorder = null;
    try {
      recorder.stop();
      await this.loopPromise;
      recorder.release();
    } catch (err) {
      this.logger.warn("Failed to stop PvRecorder.", { detail: describeError(err) });
    } finally {
      this.loopPromise = null;
    }
  }

  onChunk(handler: AudioChunkHandler): () => void {
    this.handlers.add(handler);
    return () => {
      this.handlers.delete(handler);
    };
  }

  private async pumpAudio(recorder: PvRecorder) {
    while (this.recorder === recorder && recorder.isRecording) {
      let pcm: Int16Array;
      try {
        pcm = await recorder.read();
      } catch (err) {
        // read() rejects once stop() has run; that is the normal exit.
        if (this.recorder !== recorder) break;
        throw err;
      }
      if (this.recorder !== recorder) break;
      if (!pcm.length) continue;
      const chunk = Buffer.from(pcm.buffer, pcm.byteOffset, pcm.byteLength);
      for (const handler of this.handlers) {
        try {
          handler(chunk);
        } catch (err) {
          this.logger.warn("Audio chunk handler failed.", { detail: describeError(err) });
        }
      }
    }
  }
}

function resolveAudioDeviceIndex(label: string | undefined, logger: LoggerPort): number {
  if (!label || label.toLowerCase() === "default") return -1;
  if (/^-?\d+$/.test(label)) return Number.parseInt(label, 10);

  try {
    const devices = PvRecorder.getAvailableDevices();
    const idx = devices.findIndex((name) => name.toLowerCase().includes(label.toLowerCase()));
    if (idx >= 0) {
      logger.info("Audio device matched.", { label, index: idx, device: devices[idx] });
      return idx;
    }
    logger.warn("Audio device not found; falling back to default.", { label, available: devices });
  } catch (err) {
    logger.warn("Could not enumerate audio devices; falling back to default.", { detail: describeError(err) });
  }
  return -1;
}
