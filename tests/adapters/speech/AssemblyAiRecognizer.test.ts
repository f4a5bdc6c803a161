import { AssemblyAI } from 'assemblyai';
import { AssemblyAiRecognizer } from '../../../src/adapters/speech/AssemblyAiRecognizer';
import { RecognizerError } from '../../../src/domain/errors';
import { RecordingLogger } from '../../helpers/fakes';

const mockTranscribe = jest.fn();

jest.mock('assemblyai', () => ({
  AssemblyAI: jest.fn().mockImplementation(() => ({
    transcripts: { transcribe: (params: unknown) => mockTranscribe(params) },
  })),
}));

describe('AssemblyAiRecognizer', () => {
  beforeEach(() => {
    mockTranscribe.mockReset();
  });

  test('uploads the samples as a 16-bit WAV', async () => {
    mockTranscribe.mockResolvedValue({ id: 't1', status: 'completed', text: '', words: [] });
    const recognizer = new AssemblyAiRecognizer({ apiKey: 'test-key' }, new RecordingLogger());

    await recognizer.recognize(new Float32Array([0, 0.5]), 16000);

    expect(AssemblyAI).toHaveBeenCalledWith({ apiKey: 'test-key' });
    const params = mockTranscribe.mock.calls[0][0];
    expect(params).not.toHaveProperty('language_code');
    expect(params.audio.length).toBe(48);
    expect(params.audio.toString('ascii', 8, 12)).toBe('WAVE');
    expect(params.audio.readUInt32LE(24)).toBe(16000);
    expect(params.audio.readInt16LE(46)).toBe(16384);
  });

  test('answers with text and per-word timestamps', async () => {
    mockTranscribe.mockResolvedValue({
      id: 't2',
      status: 'completed',
      text: 'hello there',
      words: [
        { text: 'hello', start: 0, end: 400, confidence: 0.9 },
        { text: 'there', start: 420, end: 800, confidence: 0.8 },
      ],
    });
    const recognizer = new AssemblyAiRecognizer({ apiKey: 'test-key' }, new RecordingLogger());

    await expect(recognizer.recognize(new Float32Array(4), 16000)).resolves.toEqual({
      text: 'hello there',
      timestamp: [
        { text: 'hello', timestamp: [0, 400] },
        { text: 'there', timestamp: [420, 800] },
      ],
    });
  });

  test('passes the language code when configured', async () => {
    mockTranscribe.mockResolvedValue({ id: 't3', status: 'completed', text: null, words: null });
    const recognizer = new AssemblyAiRecognizer({ apiKey: 'test-key', languageCode: 'de' }, new RecordingLogger());

    await expect(recognizer.recognize(new Float32Array(2), 8000)).resolves.toEqual({ text: '', timestamp: [] });
    expect(mockTranscribe.mock.calls[0][0].language_code).toBe('de');
  });

  test('an errored transcript raises RecognizerError', async () => {
    mockTranscribe.mockResolvedValue({ id: 't4', status: 'error', error: 'Audio too short' });
    const recognizer = new AssemblyAiRecognizer({ apiKey: 'test-key' }, new RecordingLogger());

    const pending = recognizer.recognize(new Float32Array(2), 16000);
    await expect(pending).rejects.toThrow(RecognizerError);
    await expect(pending).rejects.toThrow('Audio too short');
  });
});
