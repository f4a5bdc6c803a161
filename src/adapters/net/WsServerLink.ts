import WebSocket from "ws";
import type { LinkClosedHandler, ServerLinkPort, ServerMessageHandler } from "../../ports/net/ServerLinkPort";
import type { LoggerPort } from "../../ports/sys/LoggerPort";
import { ConnectionError, describeError } from "../../domain/errors";
import { rawDataToBuffer } from "./rawData";

export class WsServerLink implements ServerLinkPort {
  private readonly messageHandlers = new Set<ServerMessageHandler>();
  private readonly closeHandlers = new Set<LinkClosedHandler>();

  static async connect(url: string, logger: LoggerPort): Promise<WsServerLink> {
    const socket = new WebSocket(url);
    try {
      await onceOpen(socket);
    } catch (err) {
      socket.terminate();
      throw new ConnectionError(`Could not connect to ${url}: ${describeError(err)}`, { cause: err });
    }
    logger.info("Connected to transcription server.", { url });
    return new WsServerLink(socket, logger);
  }

  constructor(
    private readonly socket: WebSocket,
    private readonly logger: LoggerPort
  ) {
    socket.on("message", (data, isBinary) => {
      if (isBinary) {
        this.logger.warn("Ignoring binary message from server.");
        return;
      }
      const text = rawDataToBuffer(data).toString("utf8");
      for (const handler of this.messageHandlers) {
        try {
          handler(text);
        } catch (err) {
          this.logger.warn("Server message handler failed.", { detail: describeError(err) });
        }
      }
    });

    socket.on("close", (code, reason) => {
      const text = reason.toString("utf8");
      const detail = text ? `code=${code} reason=${text}` : `code=${code}`;
      this.logger.info("Server connection closed.", { detail });
      for (const handler of this.closeHandlers) {
        handler(detail);
      }
    });

    socket.on("error", (err) => {
      this.logger.error("Server connection error.", { detail: err.message });
    });
  }

  sendAudio(frame: Buffer): Promise<void> {
    return this.send(frame);
  }

  sendControl(text: string): Promise<void> {
    return this.send(text);
  }

  onMessage(handler: ServerMessageHandler): () => void {
    this.messageHandlers.add(handler);
    return () => {
      this.messageHandlers.delete(handler);
    };
  }

  onClose(handler: LinkClosedHandler): () => void {
    this.closeHandlers.add(handler);
    return () => {
      this.closeHandlers.delete(handler);
    };
  }

  async close(): Promise<void> {
    if (this.socket.readyState === WebSocket.CLOSED) return;
    const closed = new Promise<void>((resolve) => {
      this.socket.once("close", () => resolve());
    });
    this.socket.close();
    await closed;
  }

  private send(payload: Buffer | string): Promise<void> {
    if (this.socket.readyState !== WebSocket.OPEN) {
      return Promise.reject(new ConnectionError("Connection to the server is not open."));
    }
    return new Promise((resolve, reject) => {
      this.socket.send(payload, (err) => (err ? reject(err) : resolve()));
    });
  }
}

function onceOpen(ws: WebSocket): Promise<void> {
  return new Promise((resolve, reject) => {
    ws.once("open", () => resolve());
    ws.once("error", (err) => reject(err));
  });
}
