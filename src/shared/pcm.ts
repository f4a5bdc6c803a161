export const PCM16_BYTES_PER_SAMPLE = 2;
const PCM16_SCALE = 32768;

/** Little-endian signed 16-bit PCM to floats in [-1, 1]. A dangling odd byte is ignored. */
export function pcm16ToFloat32(pcm: Buffer): Float32Array {
  const count = Math.floor(pcm.length / PCM16_BYTES_PER_SAMPLE);
  const samples = new Float32Array(count);
  for (let i = 0; i < count; i++) {
    samples[i] = pcm.readInt16LE(i * PCM16_BYTES_PER_SAMPLE) / PCM16_SCALE;
  }
  return samples;
}

export function float32ToPcm16(samples: Float32Array): Buffer {
  const pcm = Buffer.alloc(samples.length * PCM16_BYTES_PER_SAMPLE);
  for (let i = 0; i < samples.length; i++) {
    const clamped = Math.max(-1, Math.min(1, samples[i]));
    const value = Math.max(-PCM16_SCALE, Math.min(PCM16_SCALE - 1, Math.round(clamped * PCM16_SCALE)));
    pcm.writeInt16LE(value, i * PCM16_BYTES_PER_SAMPLE);
  }
  return pcm;
}
