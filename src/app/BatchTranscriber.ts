import { promises as fs } from "fs";
import path from "path";
import type { LoggerPort } from "../ports/sys/LoggerPort";
import { decodeWav, type DecodedAudio } from "../adapters/audio/WavCodec";
import { describeError } from "../domain/errors";
import type { RecognitionDispatcher } from "./RecognitionDispatcher";

export const AUDIO_EXTENSIONS = [".wav"];

export interface BatchFileResult {
  filename: string;
  text: string;
  timestamps: Array<{ text: string; start: number; end: number }>;
}

export interface BatchSummary {
  found: number;
  succeeded: number;
  outputs: string[];
}

/** Offline mode: one recognizer call per audio file, one JSON result per input. */
export class BatchTranscriber {
  constructor(
    private readonly dispatcher: RecognitionDispatcher,
    private readonly logger: LoggerPort
  ) {}

  async processPath(input: string, outputDir: string): Promise<BatchSummary> {
    const stat = await fs.stat(input);
    const files = stat.isDirectory() ? await this.findAudioFiles(input) : [input];

    if (stat.isDirectory()) {
      this.logger.info("Input is a directory; processing every audio file.", { input, files: files.length });
    }

    const outputs: string[] = [];
    for (const [index, file] of files.entries()) {
      this.logger.info(`Processing audio file (${index + 1}/${files.length}).`, { file });
      const output = await this.processFile(file, outputDir);
      if (output) outputs.push(output);
    }

    this.logger.info("Batch finished.", { found: files.length, succeeded: outputs.length });
    return { found: files.length, succeeded: outputs.length, outputs };
  }

  /** Returns the written result path, or null when the file could not be transcribed. */
  async processFile(file: string, outputDir: string): Promise<string | null> {
    let decoded: DecodedAudio;
    try {
      decoded = decodeWav(await fs.readFile(file));
    } catch (err) {
      this.logger.error("Failed to load audio file.", { file, detail: describeError(err) });
      return null;
    }

    this.logger.info("Audio file loaded.", {
      file,
      sampleRate: decoded.sampleRate,
      channels: decoded.channels,
      seconds: Number((decoded.samples.length / decoded.sampleRate).toFixed(2)),
    });

    const result = await this.dispatcher.recognizeSamples(decoded.samples, decoded.sampleRate, path.basename(file));
    if (result.error !== undefined) {
      this.logger.error("Failed to transcribe audio file.", { file, detail: result.error });
      return null;
    }

    const payload: BatchFileResult = {
      filename: path.basename(file),
      text: result.text,
      timestamps: result.segments.map((segment) => ({
        text: segment.text,
        start: segment.startTime,
        end: segment.endTime,
      })),
    };

    const target = path.join(outputDir, `${path.parse(file).name}_result.json`);
    try {
      await fs.mkdir(outputDir, { recursive: true });
      await fs.writeFile(target, JSON.stringify(payload, null, 2), "utf8");
    } catch (err) {
      this.logger.error("Failed to save result.", { file, output: target, detail: describeError(err) });
      return null;
    }
    this.logger.info("Result saved.", { file, output: target, textLength: payload.text.length });
    return target;
  }

  private async findAudioFiles(dir: string): Promise<string[]> {
    const found: string[] = [];
    const entries = await fs.readdir(dir, { withFileTypes: true });
    entries.sort((a, b) => a.name.localeCompare(b.name));

    for (const entry of entries) {
      const full = path.join(dir, entry.name);
      if (entry.isDirectory()) {
        found.push(...(await this.findAudioFiles(full)));
      } else if (entry.isFile() && AUDIO_EXTENSIONS.includes(path.extname(entry.name).toLowerCase())) {
        found.push(full);
      }
    }
    return found;
  }
}
