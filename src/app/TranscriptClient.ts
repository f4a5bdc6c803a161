import type { ServerLinkPort } from "../ports/net/ServerLinkPort";
import type { LoggerPort } from "../ports/sys/LoggerPort";
import type { TranscriptAggregator } from "../domain/transcript/TranscriptAggregator";
import { ProtocolError } from "../domain/errors";
import { decodeResult, type RecognitionResult } from "../shared/protocol";
import type { TranscriptDisplay } from "./TranscriptDisplay";

/** Receive side of the client: decodes results and feeds the running transcript. */
export class TranscriptClient {
  private removeMessageHandler: (() => void) | null = null;

  constructor(
    private readonly link: ServerLinkPort,
    private readonly transcript: TranscriptAggregator,
    private readonly display: TranscriptDisplay,
    private readonly logger: LoggerPort
  ) {}

  start(): void {
    this.stop();
    this.removeMessageHandler = this.link.onMessage((text) => this.handleMessage(text));
  }

  stop(): void {
    this.removeMessageHandler?.();
    this.removeMessageHandler = null;
  }

  handleMessage(text: string): RecognitionResult | null {
    let result: RecognitionResult;
    try {
      result = decodeResult(text);
    } catch (err) {
      if (err instanceof ProtocolError) {
        this.logger.error("Could not decode server result.", { detail: err.message });
        return null;
      }
      throw err;
    }

    if (result.error !== undefined) {
      this.logger.error("Server reported a recognition error.", { detail: result.error });
      return result;
    }

    this.transcript.onResult(result.text);
    this.display.render(result.text, this.transcript.snapshot());
    return result;
  }
}
