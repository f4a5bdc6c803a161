import type { TimePort } from "../ports/sys/TimePort";
import type { TranscriptSnapshot } from "../domain/transcript/TranscriptAggregator";

export interface TextSink {
  write(text: string): unknown;
}

const CLEAR_SCREEN = "\x1bc";

export class TranscriptDisplay {
  constructor(
    private readonly out: TextSink,
    private readonly time: TimePort,
    private readonly options: { clearScreen?: boolean } = {}
  ) {}

  render(latest: string, snapshot: TranscriptSnapshot): void {
    if (!latest) return;
    this.out.write(this.format(latest, snapshot));
  }

  format(latest: string, snapshot: TranscriptSnapshot): string {
    const lines: string[] = [];
    lines.push("", "===== Live transcription =====");
    lines.push("", `[current]     ${latest}`);

    if (snapshot.accumulatedText) {
      lines.push("", `[transcript]  ${snapshot.accumulatedText}`);
    }

    if (snapshot.sessionStartTime > 0) {
      const seconds = (this.time.now() - snapshot.sessionStartTime) / 1000;
      lines.push("", `[duration]    ${seconds.toFixed(1)}s`);
    }

    lines.push("", "Press 's' + Enter to stop/start recording, 'q' + Enter to quit.");
    lines.push("==============================", "");

    const body = lines.join("\n");
    return this.options.clearScreen === false ? body : `${CLEAR_SCREEN}${body}`;
  }
}
