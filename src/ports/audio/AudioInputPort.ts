export type AudioChunkHandler = (chunk: Buffer) => void;

/** Mono PCM16LE capture source. */
export interface AudioInputPort {
  start(): Promise<void>;
  stop(): Promise<void>;
  onChunk(handler: AudioChunkHandler): () => void;
}
