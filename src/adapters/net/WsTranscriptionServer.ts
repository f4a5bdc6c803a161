import { randomUUID } from "crypto";
import type { IncomingMessage } from "http";
import WebSocket, { WebSocketServer, type RawData } from "ws";
import type { ClientConnection, InboundMessage } from "../../ports/net/ClientConnection";
import type { LoggerPort } from "../../ports/sys/LoggerPort";
import type { ConnectionManager } from "../../app/ConnectionManager";
import { rawDataToBuffer } from "./rawData";

export class WsClientConnection implements ClientConnection {
  constructor(
    readonly id: string,
    private readonly socket: WebSocket,
    readonly remoteAddress?: string
  ) {}

  isOpen(): boolean {
    return this.socket.readyState === WebSocket.OPEN;
  }

  send(text: string): Promise<void> {
    return new Promise((resolve, reject) => {
      this.socket.send(text, (err) => (err ? reject(err) : resolve()));
    });
  }
}

export function toInboundMessage(data: RawData, isBinary: boolean): InboundMessage {
  const buffer = rawDataToBuffer(data);
  return isBinary ? { kind: "binary", data: buffer } : { kind: "text", data: buffer.toString("utf8") };
}

/** One task per socket; each socket's messages reach the manager in arrival order. */
export class WsTranscriptionServer {
  private server: WebSocketServer | null = null;

  constructor(
    private readonly manager: ConnectionManager,
    private readonly logger: LoggerPort
  ) {}

  /** Bound port once listening; differs from the requested one when that was 0. */
  get port(): number | undefined {
    const address = this.server?.address();
    return address && typeof address === "object" ? address.port : undefined;
  }

  async listen(host: string, port: number): Promise<void> {
    if (this.server) return;

    const server = new WebSocketServer({ host, port });
    await new Promise<void>((resolve, reject) => {
      server.once("listening", () => resolve());
      server.once("error", (err) => reject(err));
    });

    server.on("connection", (socket, request) => this.accept(socket, request));
    server.on("error", (err) => {
      this.logger.error("WebSocket server error.", { detail: err.message });
    });
    this.server = server;
    this.logger.info("WebSocket server listening.", { url: `ws://${host}:${this.port ?? port}` });
  }

  async close(): Promise<void> {
    const server = this.server;
    if (!server) return;
    this.server = null;

    this.manager.disconnectAll();
    for (const client of server.clients) {
      client.terminate();
    }
    await new Promise<void>((resolve, reject) => {
      server.close((err) => (err ? reject(err) : resolve()));
    });
    this.logger.info("WebSocket server closed.");
  }

  private accept(socket: WebSocket, request: IncomingMessage) {
    const connection = new WsClientConnection(randomUUID(), socket, request.socket.remoteAddress);
    const id = connection.id;
    this.manager.connect(connection);

    socket.on("message", (data, isBinary) => {
      this.manager.receive(id, toInboundMessage(data, isBinary));
    });

    socket.on("close", (code, reason) => {
      const text = reason.toString("utf8");
      this.manager.disconnect(id, "closed", text ? `code=${code} reason=${text}` : `code=${code}`);
    });

    socket.on("error", (err) => {
      this.manager.disconnect(id, "error", err.message);
      socket.terminate();
    });
  }
}
