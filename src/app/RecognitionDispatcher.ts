import type { RecognizerPort } from "../ports/speech/RecognizerPort";
import type { LoggerPort } from "../ports/sys/LoggerPort";
import type { TimePort } from "../ports/sys/TimePort";
import { describeError } from "../domain/errors";
import { emptyResult, type RecognitionResult } from "../shared/protocol";
import { pcm16ToFloat32 } from "../shared/pcm";
import { parseRecognizerOutput } from "../shared/recognition";

export const UNEXPECTED_SHAPE_ERROR = "unexpected result shape";

/**
 * Turns buffered PCM into a RecognitionResult. Never throws: recognizer failures
 * come back as results with `error` set.
 */
export class RecognitionDispatcher {
  constructor(
    private readonly recognizer: RecognizerPort,
    private readonly logger: LoggerPort,
    private readonly time: TimePort
  ) {}

  async dispatch(audio: Buffer, sampleRate: number, label = "session"): Promise<RecognitionResult> {
    if (!audio.length) {
      this.logger.warn("Audio buffer is empty; skipping recognition.", { source: label });
      return emptyResult();
    }

    const samples = pcm16ToFloat32(audio);
    this.logger.debug("Converted PCM to float samples.", {
      source: label,
      bytes: audio.length,
      samples: samples.length,
      sampleRate,
    });
    return this.recognizeSamples(samples, sampleRate, label);
  }

  async recognizeSamples(samples: Float32Array, sampleRate: number, label = "session"): Promise<RecognitionResult> {
    const startedAt = this.time.now();
    this.logger.info("Recognition started.", { source: label, samples: samples.length, sampleRate });

    let raw: unknown;
    try {
      raw = await this.recognizer.recognize(samples, sampleRate);
    } catch (err) {
      const detail = describeError(err);
      this.logger.error("Recognition failed.", { source: label, detail });
      return emptyResult(detail);
    }

    const output = parseRecognizerOutput(raw, this.logger);
    if (!output) {
      this.logger.error("Recognizer returned a non-record result.", {
        source: label,
        kind: raw === null ? "null" : typeof raw,
      });
      return emptyResult(UNEXPECTED_SHAPE_ERROR);
    }

    this.logger.info("Recognition finished.", {
      source: label,
      textLength: output.text.length,
      segments: output.segments.length,
      elapsedMs: this.time.now() - startedAt,
    });
    return { text: output.text, segments: output.segments };
  }
}
