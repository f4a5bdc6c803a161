export type ServerMessageHandler = (text: string) => void;
export type LinkClosedHandler = (reason: string) => void;

/** Client-side view of the connection to the transcription server. */
export interface ServerLinkPort {
  sendAudio(frame: Buffer): Promise<void>;
  sendControl(text: string): Promise<void>;
  onMessage(handler: ServerMessageHandler): () => void;
  onClose(handler: LinkClosedHandler): () => void;
  close(): Promise<void>;
}
