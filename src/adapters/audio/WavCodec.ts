export interface DecodedAudio {
  sampleRate: number;
  channels: number;
  samples: Float32Array;
}

const WAVE_FORMAT_PCM = 1;
const WAVE_FORMAT_IEEE_FLOAT = 3;
const WAVE_FORMAT_EXTENSIBLE = 0xfffe;

interface FormatChunk {
  audioFormat: number;
  channels: number;
  sampleRate: number;
  bitsPerSample: number;
}

/** Decodes a RIFF/WAVE buffer to mono floats in [-1, 1]; extra channels are averaged. */
export function decodeWav(buffer: Buffer): DecodedAudio {
  if (buffer.length < 12 || buffer.toString("ascii", 0, 4) !== "RIFF" || buffer.toString("ascii", 8, 12) !== "WAVE") {
    throw new Error("Not a RIFF/WAVE file.");
  }

  let format: FormatChunk | null = null;
  let data: Buffer | null = null;
  let offset = 12;

  while (offset + 8 <= buffer.length) {
    const id = buffer.toString("ascii", offset, offset + 4);
    const size = buffer.readUInt32LE(offset + 4);
    const body = buffer.subarray(offset + 8, Math.min(buffer.length, offset + 8 + size));

    if (id === "fmt ") {
      format = readFormat(body);
    } else if (id === "data") {
      data = body;
    }

    // Chunks are word-aligned.
    offset += 8 + size + (size % 2);
  }

  if (!format) throw new Error("WAVE file has no fmt chunk.");
  if (!data) throw new Error("WAVE file has no data chunk.");

  const readSample = sampleReader(format);
  const bytesPerSample = format.bitsPerSample / 8;
  const frameBytes = bytesPerSample * format.channels;
  const frames = Math.floor(data.length / frameBytes);
  const samples = new Float32Array(frames);

  for (let frame = 0; frame < frames; frame++) {
    let sum = 0;
    for (let channel = 0; channel < format.channels; channel++) {
      sum += readSample(data, frame * frameBytes + channel * bytesPerSample);
    }
    samples[frame] = sum / format.channels;
  }

  return { sampleRate: format.sampleRate, channels: format.channels, samples };
}

function readFormat(body: Buffer): FormatChunk {
  if (body.length < 16) throw new Error("WAVE fmt chunk is truncated.");
  let audioFormat = body.readUInt16LE(0);
  // Extensible headers carry the real format code in the sub-format GUID.
  if (audioFormat === WAVE_FORMAT_EXTENSIBLE && body.length >= 26) {
    audioFormat = body.readUInt16LE(24);
  }
  const channels = body.readUInt16LE(2);
  if (channels < 1) throw new Error("WAVE file declares zero channels.");
  return {
    audioFormat,
    channels,
    sampleRate: body.readUInt32LE(4),
    bitsPerSample: body.readUInt16LE(14),
  };
}

function sampleReader({ audioFormat, bitsPerSample }: FormatChunk): (data: Buffer, offset: number) => number {
  if (audioFormat === WAVE_FORMAT_PCM) {
    switch (bitsPerSample) {
      case 8:
        return (data, offset) => (data.readUInt8(offset) - 128) / 128;
      case 16:
        return (data, offset) => data.readInt16LE(offset) / 32768;
      case 32:
        return (data, offset) => data.readInt32LE(offset) / 2147483648;
    }
  }
  if (audioFormat === WAVE_FORMAT_IEEE_FLOAT && bitsPerSample === 32) {
    return (data, offset) => data.readFloatLE(offset);
  }
  throw new Error(`Unsupported WAVE encoding (format=${audioFormat}, bits=${bitsPerSample}).`);
}

/** Mono 16-bit PCM WAV container. */
export function encodeWavPcm16(pcm: Buffer, sampleRate: number): Buffer {
  const header = Buffer.alloc(44);
  header.write("RIFF", 0);
  header.writeUInt32LE(36 + pcm.length, 4);
  header.write("WAVE", 8);
  header.write("fmt ", 12);
  header.writeUInt32LE(16, 16);
  header.writeUInt16LE(WAVE_FORMAT_PCM, 20);
  header.writeUInt16LE(1, 22);
  header.writeUInt32LE(sampleRate, 24);
  header.writeUInt32LE(sampleRate * 2, 28);
  header.writeUInt16LE(2, 32);
  header.writeUInt16LE(16, 34);
  header.write("data", 36);
  header.writeUInt32LE(pcm.length, 40);
  return Buffer.concat([header, pcm]);
}
