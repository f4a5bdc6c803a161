import type { BatchSettings, ClientSettings, ServerSettings } from "../config";
import { ConsoleLogger } from "../adapters/sys/ConsoleLogger";
import { NodeTime } from "../adapters/sys/NodeTime";
import { AssemblyAiRecognizer } from "../adapters/speech/AssemblyAiRecognizer";
import { PvRecorderAudioInput, PV_RECORDER_SAMPLE_RATE } from "../adapters/audio/PvRecorderAudioInput";
import { WsTranscriptionServer } from "../adapters/net/WsTranscriptionServer";
import { WsServerLink } from "../adapters/net/WsServerLink";
import { SessionRegistry } from "../domain/session/SessionRegistry";
import { TranscriptAggregator } from "../domain/transcript/TranscriptAggregator";
import { ConnectionManager, type SessionEntry } from "../app/ConnectionManager";
import { RecognitionDispatcher } from "../app/RecognitionDispatcher";
import { SerializedRecognizer } from "../app/SerializedRecognizer";
import { RecordingController } from "../app/RecordingController";
import { TranscriptClient } from "../app/TranscriptClient";
import { TranscriptDisplay, type TextSink } from "../app/TranscriptDisplay";
import { BatchTranscriber } from "../app/BatchTranscriber";
import { encodeConfig } from "../shared/protocol";

export interface ApplicationInstance {
  start(): Promise<void>;
  shutdown(): Promise<void>;
}

export interface ServerInstance extends ApplicationInstance {
  readonly manager: ConnectionManager;
}

export interface ClientInstance extends ApplicationInstance {
  readonly recorder: RecordingController;
  onServerClosed(handler: (reason: string) => void): () => void;
}

export function buildServer(settings: ServerSettings, logger: ConsoleLogger): ServerInstance {
  const recognizer = new SerializedRecognizer(
    new AssemblyAiRecognizer(
      { apiKey: settings.apiKey, languageCode: settings.languageCode },
      logger.child("recognizer")
    )
  );
  const dispatcher = new RecognitionDispatcher(recognizer, logger.child("dispatch"), new NodeTime());
  const manager = new ConnectionManager(new SessionRegistry<SessionEntry>(), dispatcher, logger.child("sessions"), {
    thresholdBytes: settings.thresholdBytes,
    defaultSampleRate: settings.defaultSampleRate,
  });
  const server = new WsTranscriptionServer(manager, logger.child("ws"));

  return {
    manager,
    start: () => server.listen(settings.host, settings.port),
    shutdown: () => server.close(),
  };
}

/** Connects first; a ConnectionError here is a fatal startup failure. */
export async function buildClient(
  settings: ClientSettings,
  logger: ConsoleLogger,
  out: TextSink
): Promise<ClientInstance> {
  const link = await WsServerLink.connect(settings.serverUrl, logger.child("link"));
  const time = new NodeTime();
  const transcript = new TranscriptAggregator(time);
  const display = new TranscriptDisplay(out, time);
  const receiver = new TranscriptClient(link, transcript, display, logger.child("results"));
  const audioIn = new PvRecorderAudioInput(
    { deviceLabel: settings.audioDevice, frameLength: settings.frameLength },
    logger.child("mic")
  );
  const recorder = new RecordingController(audioIn, link, transcript, logger.child("recorder"), {
    queueCapacity: settings.queueCapacity,
  });

  return {
    recorder,
    onServerClosed: (handler) => link.onClose(handler),
    start: async () => {
      receiver.start();
      await link.sendControl(encodeConfig(PV_RECORDER_SAMPLE_RATE));
      await recorder.start();
    },
    shutdown: async () => {
      try {
        await recorder.stop();
      } catch (err) {
        logger.warn("Failed to stop recording during shutdown.", { detail: String(err) });
      }
      receiver.stop();
      await link.close();
    },
  };
}

export function buildBatch(settings: BatchSettings, logger: ConsoleLogger): BatchTranscriber {
  const recognizer = new AssemblyAiRecognizer(
    { apiKey: settings.apiKey, languageCode: settings.languageCode },
    logger.child("recognizer")
  );
  const dispatcher = new RecognitionDispatcher(recognizer, logger.child("dispatch"), new NodeTime());
  return new BatchTranscriber(dispatcher, logger.child("batch"));
}
