import { decodeWav, encodeWavPcm16 } from '../../../src/adapters/audio/WavCodec';
import { pcm } from '../../helpers/fakes';

interface WavSpec {
  format: number;
  channels: number;
  sampleRate: number;
  bits: number;
  data: Buffer;
  extraChunk?: Buffer;
}

function buildWav({ format, channels, sampleRate, bits, data, extraChunk }: WavSpec): Buffer {
  const fmt = Buffer.alloc(24);
  fmt.write('fmt ', 0);
  fmt.writeUInt32LE(16, 4);
  fmt.writeUInt16LE(format, 8);
  fmt.writeUInt16LE(channels, 10);
  fmt.writeUInt32LE(sampleRate, 12);
  fmt.writeUInt32LE((sampleRate * channels * bits) / 8, 16);
  fmt.writeUInt16LE((channels * bits) / 8, 20);
  fmt.writeUInt16LE(bits, 22);

  const dataHeader = Buffer.alloc(8);
  dataHeader.write('data', 0);
  dataHeader.writeUInt32LE(data.length, 4);

  const body = Buffer.concat([fmt, ...(extraChunk ? [extraChunk] : []), dataHeader, data]);
  const riff = Buffer.alloc(12);
  riff.write('RIFF', 0);
  riff.writeUInt32LE(4 + body.length, 4);
  riff.write('WAVE', 8);
  return Buffer.concat([riff, body]);
}

describe('WavCodec', () => {
  test('encodes a 44-byte header ahead of the samples', () => {
    const wav = encodeWavPcm16(pcm(0, 16384), 16000);

    expect(wav.length).toBe(48);
    expect(wav.toString('ascii', 0, 4)).toBe('RIFF');
    expect(wav.readUInt32LE(4)).toBe(40);
    expect(wav.readUInt32LE(24)).toBe(16000);
    expect(wav.readUInt32LE(40)).toBe(4);
  });

  test('decodes what it encodes', () => {
    const decoded = decodeWav(encodeWavPcm16(pcm(0, 16384, -16384), 22050));

    expect(decoded.sampleRate).toBe(22050);
    expect(decoded.channels).toBe(1);
    expect(Array.from(decoded.samples)).toEqual([0, 0.5, -0.5]);
  });

  test('averages stereo frames to mono', () => {
    const wav = buildWav({ format: 1, channels: 2, sampleRate: 44100, bits: 16, data: pcm(16384, 0, -8192, -8192) });

    expect(Array.from(decodeWav(wav).samples)).toEqual([0.25, -0.25]);
  });

  test('reads unsigned 8-bit samples', () => {
    const wav = buildWav({ format: 1, channels: 1, sampleRate: 8000, bits: 8, data: Buffer.from([128, 0, 192]) });

    expect(Array.from(decodeWav(wav).samples)).toEqual([0, -1, 0.5]);
  });

  test('reads 32-bit float samples', () => {
    const data = Buffer.alloc(8);
    data.writeFloatLE(0.25, 0);
    data.writeFloatLE(-0.75, 4);
    const wav = buildWav({ format: 3, channels: 1, sampleRate: 16000, bits: 32, data });

    expect(Array.from(decodeWav(wav).samples)).toEqual([0.25, -0.75]);
  });

  test('skips unknown chunks, including odd-sized ones', () => {
    const extra = Buffer.alloc(12);
    extra.write('LIST', 0);
    extra.writeUInt32LE(3, 4);
    const wav = buildWav({ format: 1, channels: 1, sampleRate: 16000, bits: 16, data: pcm(8192), extraChunk: extra });

    expect(Array.from(decodeWav(wav).samples)).toEqual([0.25]);
  });

  test('rejects files that are not RIFF/WAVE', () => {
    expect(() => decodeWav(Buffer.from('ID3 not a wave file'))).toThrow('Not a RIFF/WAVE file.');
  });

  test('rejects encodings it cannot read', () => {
    const wav = buildWav({ format: 1, channels: 1, sampleRate: 16000, bits: 24, data: Buffer.alloc(6) });

    expect(() => decodeWav(wav)).toThrow('Unsupported WAVE encoding (format=1, bits=24).');
  });
});
