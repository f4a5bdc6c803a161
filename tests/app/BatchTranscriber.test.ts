import fs from 'fs';
import os from 'os';
import path from 'path';
import { BatchTranscriber } from '../../src/app/BatchTranscriber';
import { RecognitionDispatcher } from '../../src/app/RecognitionDispatcher';
import { encodeWavPcm16 } from '../../src/adapters/audio/WavCodec';
import { FakeTime, RecordingLogger, pcm } from '../helpers/fakes';

function setup(recognize: (samples: Float32Array, sampleRate: number) => Promise<unknown>) {
  const logger = new RecordingLogger();
  const recognizeMock = jest.fn(recognize);
  const batch = new BatchTranscriber(
    new RecognitionDispatcher({ recognize: recognizeMock }, logger, new FakeTime()),
    logger
  );
  return { batch, logger, recognize: recognizeMock };
}

describe('BatchTranscriber', () => {
  let inputDir: string;
  let outputDir: string;

  beforeEach(() => {
    inputDir = fs.mkdtempSync(path.join(os.tmpdir(), 'transcribe-in-'));
    outputDir = path.join(fs.mkdtempSync(path.join(os.tmpdir(), 'transcribe-out-')), 'results');
  });

  afterEach(() => {
    fs.rmSync(inputDir, { recursive: true, force: true });
    fs.rmSync(path.dirname(outputDir), { recursive: true, force: true });
  });

  test('writes one result file per wav, walking subdirectories', async () => {
    fs.writeFileSync(path.join(inputDir, 'a.wav'), encodeWavPcm16(pcm(100, 200), 16000));
    fs.mkdirSync(path.join(inputDir, 'nested'));
    fs.writeFileSync(path.join(inputDir, 'nested', 'b.WAV'), encodeWavPcm16(pcm(300), 8000));
    fs.writeFileSync(path.join(inputDir, 'notes.txt'), 'not audio');
    const { batch, recognize } = setup(async () => ({ text: 'hi', timestamp: [{ text: 'hi', timestamp: [0, 10] }] }));

    const summary = await batch.processPath(inputDir, outputDir);

    expect(summary).toEqual({
      found: 2,
      succeeded: 2,
      outputs: [path.join(outputDir, 'a_result.json'), path.join(outputDir, 'b_result.json')],
    });
    expect(recognize.mock.calls.map(([, sampleRate]) => sampleRate)).toEqual([16000, 8000]);
    expect(JSON.parse(fs.readFileSync(path.join(outputDir, 'a_result.json'), 'utf8'))).toEqual({
      filename: 'a.wav',
      text: 'hi',
      timestamps: [{ text: 'hi', start: 0, end: 10 }],
    });
  });

  test('a single file input is processed directly', async () => {
    const file = path.join(inputDir, 'clip.wav');
    fs.writeFileSync(file, encodeWavPcm16(pcm(1), 16000));
    const { batch } = setup(async () => ({ text: 'one' }));

    const summary = await batch.processPath(file, outputDir);

    expect(summary.outputs).toEqual([path.join(outputDir, 'clip_result.json')]);
    expect(fs.readFileSync(path.join(outputDir, 'clip_result.json'), 'utf8')).toBe(
      '{\n  "filename": "clip.wav",\n  "text": "one",\n  "timestamps": []\n}'
    );
  });

  test('unreadable audio is logged and skipped', async () => {
    fs.writeFileSync(path.join(inputDir, 'broken.wav'), 'garbage');
    fs.writeFileSync(path.join(inputDir, 'good.wav'), encodeWavPcm16(pcm(1), 16000));
    const { batch, logger } = setup(async () => ({ text: 'ok' }));

    const summary = await batch.processPath(inputDir, outputDir);

    expect(summary.found).toBe(2);
    expect(summary.succeeded).toBe(1);
    expect(logger.messages('error')).toEqual(['Failed to load audio file.']);
  });

  test('recognizer failures produce no result file', async () => {
    const file = path.join(inputDir, 'clip.wav');
    fs.writeFileSync(file, encodeWavPcm16(pcm(1), 16000));
    const { batch } = setup(async () => {
      throw new Error('quota exceeded');
    });

    await expect(batch.processFile(file, outputDir)).resolves.toBeNull();
    expect(fs.existsSync(path.join(outputDir, 'clip_result.json'))).toBe(false);
  });
});
