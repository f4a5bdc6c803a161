import { SessionBuffer } from '../../../src/domain/session/SessionBuffer';
import { emptyResult, type RecognitionResult } from '../../../src/shared/protocol';
import { RecordingLogger, deferred, flushAsync, type Deferred } from '../../helpers/fakes';

function lengthDispatch() {
  return jest.fn<Promise<RecognitionResult>, [Buffer, number]>(async (audio, sampleRate) => ({
    text: `${audio.length}@${sampleRate}`,
    segments: [],
  }));
}

describe('SessionBuffer', () => {
  test('ten 3200-byte frames trigger exactly one dispatch on the tenth', async () => {
    const dispatch = lengthDispatch();
    const sink = jest.fn();
    const session = new SessionBuffer('s1', dispatch, sink);
    const frame = Buffer.alloc(3200);

    for (let i = 0; i < 9; i++) {
      expect(session.append(frame)).toBeNull();
    }
    expect(dispatch).not.toHaveBeenCalled();
    expect(session.bufferedBytes).toBe(28800);

    const pending = session.append(frame);
    expect(pending).not.toBeNull();
    expect(dispatch).toHaveBeenCalledTimes(1);
    expect(dispatch.mock.calls[0][0].length).toBe(32000);
    expect(session.bufferedBytes).toBe(0);

    await expect(pending).resolves.toEqual({ text: '32000@16000', segments: [] });
    expect(sink).toHaveBeenCalledWith({ text: '32000@16000', segments: [] });
  });

  test('nine frames then a flush dispatch the 28800 buffered bytes once', async () => {
    const dispatch = lengthDispatch();
    const sink = jest.fn();
    const session = new SessionBuffer('s1', dispatch, sink);
    for (let i = 0; i < 9; i++) session.append(Buffer.alloc(3200));

    const result = await session.flush();

    expect(dispatch).toHaveBeenCalledTimes(1);
    expect(result.text).toBe('28800@16000');
    expect(session.bufferedBytes).toBe(0);
  });

  test('flushing an empty buffer still produces one result', async () => {
    const dispatch = jest.fn<Promise<RecognitionResult>, [Buffer, number]>(async () => emptyResult());
    const sink = jest.fn();
    const session = new SessionBuffer('s1', dispatch, sink);

    await session.flush();

    expect(dispatch).toHaveBeenCalledTimes(1);
    expect(dispatch.mock.calls[0][0].length).toBe(0);
    expect(sink).toHaveBeenCalledWith({ text: '', segments: [] });
  });

  test('dispatches run one at a time and results arrive in submission order', async () => {
    const gates: Array<Deferred<RecognitionResult>> = [];
    const dispatch = jest.fn<Promise<RecognitionResult>, [Buffer, number]>(() => {
      const gate = deferred<RecognitionResult>();
      gates.push(gate);
      return gate.promise;
    });
    const delivered: string[] = [];
    const session = new SessionBuffer('s1', dispatch, (result) => {
      delivered.push(result.text);
    }, { thresholdBytes: 4 });

    const first = session.append(Buffer.alloc(4));
    const second = session.append(Buffer.alloc(4));
    expect(dispatch).toHaveBeenCalledTimes(1);
    expect(session.pendingDispatches).toBe(2);

    gates[0].resolve({ text: 'first', segments: [] });
    await first;
    await flushAsync();
    expect(dispatch).toHaveBeenCalledTimes(2);

    gates[1].resolve({ text: 'second', segments: [] });
    await second;
    expect(delivered).toEqual(['first', 'second']);
  });

  test('idle resolves once every queued dispatch has delivered', async () => {
    const gate = deferred<RecognitionResult>();
    const dispatch = jest
      .fn<Promise<RecognitionResult>, [Buffer, number]>(async () => ({ text: 'second', segments: [] }))
      .mockImplementationOnce(() => gate.promise);
    const delivered: string[] = [];
    const session = new SessionBuffer('s1', dispatch, (result) => {
      delivered.push(result.text);
    }, { thresholdBytes: 4 });

    session.append(Buffer.alloc(4));
    session.append(Buffer.alloc(4));
    const idle = session.idle();
    gate.resolve({ text: 'first', segments: [] });
    await idle;

    expect(delivered).toEqual(['first', 'second']);
    expect(session.pendingDispatches).toBe(0);
  });

  test('an odd trailing byte is carried into the next dispatch', async () => {
    const dispatch = lengthDispatch();
    const session = new SessionBuffer('s1', dispatch, jest.fn(), { thresholdBytes: 4 });

    await session.append(Buffer.from([1, 2, 3, 4, 5]));
    expect(Array.from(dispatch.mock.calls[0][0])).toEqual([1, 2, 3, 4]);
    expect(session.bufferedBytes).toBe(1);

    await session.append(Buffer.from([6, 7, 8]));
    expect(Array.from(dispatch.mock.calls[1][0])).toEqual([5, 6, 7, 8]);
    expect(session.bufferedBytes).toBe(0);
  });

  test('flush drops a dangling odd byte with a warning', async () => {
    const dispatch = lengthDispatch();
    const logger = new RecordingLogger();
    const session = new SessionBuffer('s1', dispatch, jest.fn(), { logger });

    session.append(Buffer.from([1, 2, 3]));
    const result = await session.flush();

    expect(result.text).toBe('2@16000');
    expect(logger.messages('warn')).toEqual(['Dropping incomplete trailing sample on flush.']);
  });

  test('configure applies to the next dispatch and keeps buffered audio', async () => {
    const dispatch = lengthDispatch();
    const session = new SessionBuffer('s1', dispatch, jest.fn());

    session.append(Buffer.alloc(400));
    session.configure(8000);
    expect(session.bufferedBytes).toBe(400);
    expect(session.sampleRate).toBe(8000);

    const result = await session.flush();
    expect(result.text).toBe('400@8000');
  });

  test('the sample rate is captured when a dispatch is submitted', async () => {
    const dispatch = lengthDispatch();
    const session = new SessionBuffer('s1', dispatch, jest.fn(), { thresholdBytes: 4 });

    const pending = session.append(Buffer.alloc(4));
    session.configure(44100);

    await expect(pending).resolves.toEqual({ text: '4@16000', segments: [] });
  });

  test('a failed dispatch becomes an error result for the sink', async () => {
    const dispatch = jest.fn<Promise<RecognitionResult>, [Buffer, number]>(async () => {
      throw new Error('model offline');
    });
    const sink = jest.fn();
    const session = new SessionBuffer('s1', dispatch, sink);

    await session.flush();

    expect(sink).toHaveBeenCalledWith({ text: '', segments: [], error: 'model offline' });
  });

  test('a throwing sink is logged and does not reject the dispatch', async () => {
    const logger = new RecordingLogger();
    const session = new SessionBuffer('s1', lengthDispatch(), () => {
      throw new Error('socket gone');
    }, { logger });

    await expect(session.flush()).resolves.toEqual({ text: '0@16000', segments: [] });
    expect(logger.messages('error')).toEqual(['Failed to deliver recognition result.']);
  });

  test('dispose discards audio and withholds the in-flight result', async () => {
    const gate = deferred<RecognitionResult>();
    const dispatch = jest.fn(() => gate.promise);
    const sink = jest.fn();
    const session = new SessionBuffer('s1', dispatch, sink, { thresholdBytes: 4 });

    const pending = session.append(Buffer.alloc(6));
    session.dispose();
    expect(session.isDisposed).toBe(true);
    expect(session.bufferedBytes).toBe(0);
    expect(session.append(Buffer.alloc(8))).toBeNull();

    gate.resolve({ text: 'late', segments: [] });
    await pending;
    expect(sink).not.toHaveBeenCalled();
    expect(dispatch).toHaveBeenCalledTimes(1);
  });

  test('flush after dispose resolves empty without dispatching', async () => {
    const dispatch = lengthDispatch();
    const session = new SessionBuffer('s1', dispatch, jest.fn());
    session.dispose();

    await expect(session.flush()).resolves.toEqual({ text: '', segments: [] });
    expect(dispatch).not.toHaveBeenCalled();
  });
});
