import type { ClientConnection, InboundMessage } from "../ports/net/ClientConnection";
import type { LoggerPort } from "../ports/sys/LoggerPort";
import { ConnectionStateMachine } from "../domain/connection/ConnectionStateMachine";
import { SessionBuffer } from "../domain/session/SessionBuffer";
import type { SessionRegistry } from "../domain/session/SessionRegistry";
import { describeError, ProtocolError } from "../domain/errors";
import { decodeControl, encodeResult, type ControlMessage, type RecognitionResult } from "../shared/protocol";
import type { RecognitionDispatcher } from "./RecognitionDispatcher";

export interface ConnectionManagerOptions {
  thresholdBytes?: number;
  defaultSampleRate?: number;
}

export interface SessionEntry {
  connection: ClientConnection;
  session: SessionBuffer;
  state: ConnectionStateMachine;
}

export type CloseReason = "closed" | "error";

/**
 * Routes socket traffic to per-connection sessions. The registry passed in is
 * the only record of which sessions exist.
 */
export class ConnectionManager {
  constructor(
    private readonly registry: SessionRegistry<SessionEntry>,
    private readonly dispatcher: RecognitionDispatcher,
    private readonly logger: LoggerPort,
    private readonly options: ConnectionManagerOptions = {}
  ) {}

  get activeSessions(): number {
    return this.registry.size;
  }

  hasSession(id: string): boolean {
    return this.registry.has(id);
  }

  getSession(id: string): SessionBuffer | undefined {
    return this.registry.get(id)?.session;
  }

  connect(connection: ClientConnection): SessionBuffer {
    const existing = this.registry.get(connection.id);
    if (existing) {
      this.logger.warn("Connection already has a session; reusing it.", { sessionId: connection.id });
      return existing.session;
    }

    const session = new SessionBuffer(
      connection.id,
      (audio, sampleRate) => this.dispatcher.dispatch(audio, sampleRate, connection.id),
      (result) => this.deliver(connection, result),
      {
        thresholdBytes: this.options.thresholdBytes,
        sampleRate: this.options.defaultSampleRate,
        logger: this.logger,
      }
    );

    this.registry.insert(connection.id, {
      connection,
      session,
      state: new ConnectionStateMachine(),
    });
    this.logger.info("Client connected.", {
      sessionId: connection.id,
      remoteAddress: connection.remoteAddress,
      activeSessions: this.registry.size,
    });
    return session;
  }

  receive(id: string, message: InboundMessage): void {
    const entry = this.registry.get(id);
    if (!entry) {
      this.logger.warn("Message for unknown or closed session dropped.", { sessionId: id, kind: message.kind });
      return;
    }

    if (message.kind === "binary") {
      this.handleAudio(entry, message.data);
      return;
    }

    this.handleControl(entry, message.data);
  }

  /** Terminal. Buffered audio that was never dispatched is discarded, not flushed. */
  disconnect(id: string, reason: CloseReason, detail?: string): boolean {
    const entry = this.registry.remove(id);
    if (!entry) return false;

    entry.state.onClose();
    const discardedBytes = entry.session.bufferedBytes;
    entry.session.dispose();

    const meta = {
      sessionId: id,
      reason,
      detail,
      discardedBytes,
      activeSessions: this.registry.size,
    };
    if (reason === "error") {
      this.logger.error("Client connection failed; session cleaned up.", meta);
    } else {
      this.logger.info("Client disconnected; session cleaned up.", meta);
    }
    return true;
  }

  /** Drops every session, e.g. on server shutdown. */
  disconnectAll(): void {
    for (const id of this.registry.ids()) {
      this.disconnect(id, "closed", "server shutdown");
    }
  }

  private handleAudio(entry: SessionEntry, frame: Buffer) {
    if (!entry.state.onAudio()) return;
    this.logger.debug("Received audio frame.", { sessionId: entry.connection.id, bytes: frame.length });
    this.track(entry, entry.session.append(frame));
  }

  private handleControl(entry: SessionEntry, text: string) {
    const id = entry.connection.id;
    let message: ControlMessage;
    try {
      message = decodeControl(text);
    } catch (err) {
      if (err instanceof ProtocolError) {
        this.logger.warn("Skipping malformed control message.", { sessionId: id, detail: err.message });
        return;
      }
      throw err;
    }

    switch (message.type) {
      case "config":
        if (!entry.state.onConfig()) return;
        entry.session.configure(message.sampleRate);
        this.logger.info("Session configured.", { sessionId: id, sampleRate: message.sampleRate });
        return;
      case "eof":
        if (!entry.state.onEof()) return;
        this.logger.debug("Received EOF; flushing buffered audio.", {
          sessionId: id,
          bytes: entry.session.bufferedBytes,
        });
        this.track(entry, entry.session.flush());
        return;
      case "unknown":
        this.logger.debug("Ignoring control message with unknown type.", { sessionId: id, type: message.name });
        return;
    }
  }

  private track(entry: SessionEntry, pending: Promise<RecognitionResult> | null) {
    pending?.catch((err) => {
      this.logger.error("Dispatch failed unexpectedly.", {
        sessionId: entry.connection.id,
        detail: describeError(err),
      });
    });
  }

  private async deliver(connection: ClientConnection, result: RecognitionResult): Promise<void> {
    if (!connection.isOpen()) {
      this.logger.debug("Connection no longer open; dropping result.", { sessionId: connection.id });
      return;
    }
    await connection.send(encodeResult(result));
  }
}
