import { AssemblyAI } from "assemblyai";
import type { RecognizerPort } from "../../ports/speech/RecognizerPort";
import type { LoggerPort } from "../../ports/sys/LoggerPort";
import { RecognizerError } from "../../domain/errors";
import { float32ToPcm16 } from "../../shared/pcm";
import { encodeWavPcm16 } from "../audio/WavCodec";

export interface AssemblyAiRecognizerOptions {
  apiKey: string;
  languageCode?: string;
}

/**
 * Uploads each dispatch as a mono 16-bit WAV and answers in the recognizer
 * contract shape: `{ text, timestamp: [{ text, timestamp: [startMs, endMs] }] }`.
 */
export class AssemblyAiRecognizer implements RecognizerPort {
  private readonly client: AssemblyAI;

  constructor(
    private readonly options: AssemblyAiRecognizerOptions,
    private readonly logger: LoggerPort
  ) {
    this.client = new AssemblyAI({ apiKey: options.apiKey });
  }

  async recognize(samples: Float32Array, sampleRate: number): Promise<unknown> {
    const wav = encodeWavPcm16(float32ToPcm16(samples), sampleRate);
    this.logger.debug("Uploading audio to AssemblyAI.", { bytes: wav.length, sampleRate });

    const transcript = await this.client.transcripts.transcribe({
      audio: wav,
      ...(this.options.languageCode ? { language_code: this.options.languageCode } : {}),
    });

    if (transcript.status === "error") {
      throw new RecognizerError(transcript.error || "AssemblyAI transcription failed.");
    }

    this.logger.debug("AssemblyAI transcript received.", {
      id: transcript.id,
      words: transcript.words?.length ?? 0,
    });

    return {
      text: transcript.text ?? "",
      timestamp: (transcript.words ?? []).map((word) => ({
        text: word.text,
        timestamp: [word.start, word.end],
      })),
    };
  }
}
