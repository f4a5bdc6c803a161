/**
 * Opaque speech recognizer: (float samples in [-1, 1], sample rate) -> native payload.
 *
 * The payload is expected to be a record carrying at least `text` and optionally a
 * `timestamp` list, but callers must validate it (see `shared/recognition`).
 */
export interface RecognizerPort {
  recognize(samples: Float32Array, sampleRate: number): Promise<unknown>;
}
