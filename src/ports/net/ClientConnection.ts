export type InboundMessage =
  | { kind: "text"; data: string }
  | { kind: "binary"; data: Buffer };

/** Server-side view of one connected client socket. */
export interface ClientConnection {
  readonly id: string;
  readonly remoteAddress?: string;
  isOpen(): boolean;
  send(text: string): Promise<void>;
}
