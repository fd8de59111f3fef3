import { describe, it, expect, vi } from 'vitest';
import { InteractionCycle } from '../src/core/interaction-cycle';
import type { InteractionCycleOptions } from '../src/core/interaction-cycle';
import { ConversationSession } from '../src/core/session';
import {
  ChatClientError,
  RecordingError,
  SpeechSynthesisError,
  TranscriptionError,
} from '../src/core/errors';
import {
  FakeAudioInput,
  MockChatClient,
  MockCues,
  MockRecorder,
  MockSTT,
  MockStreamingChatClient,
  MockTTS,
  loudFrame,
} from './helpers/mock-providers';
import type { StreamingChatClient } from '../src/core/types';

vi.mock('../src/utils/logger', () => ({
  createLogger: () => ({
    debug: () => {},
    info: () => {},
    warn: () => {},
    error: () => {},
  }),
}));

interface CycleLog {
  transcription: string[];
  sentence: string[];
  response: string[];
  interrupted: number;
}

interface Harness {
  cycle: InteractionCycle;
  recorder: MockRecorder;
  stt: MockSTT;
  tts: MockTTS;
  cues: MockCues;
  events: CycleLog;
}

function harness(options: Partial<InteractionCycleOptions> & Pick<InteractionCycleOptions, 'chat'>): Harness {
  const recorder = new MockRecorder();
  const stt = new MockSTT();
  const tts = new MockTTS();
  const cues = new MockCues();
  const cycle = new InteractionCycle({
    recorder,
    stt,
    tts,
    cues,
    monitorPollIntervalMs: 5,
    ...options,
  });

  const events: CycleLog = { transcription: [], sentence: [], response: [], interrupted: 0 };
  cycle.on('transcription', (t: string) => events.transcription.push(t));
  cycle.on('sentence', (t: string) => events.sentence.push(t));
  cycle.on('response', (t: string) => events.response.push(t));
  cycle.on('interrupted', () => { events.interrupted++; });

  return {
    cycle,
    recorder: options.recorder instanceof MockRecorder ? options.recorder : recorder,
    stt: options.stt instanceof MockSTT ? options.stt : stt,
    tts: options.tts instanceof MockTTS ? options.tts : tts,
    cues: options.cues instanceof MockCues ? options.cues : cues,
    events,
  };
}

describe('InteractionCycle', () => {
  // ─── Basic backend ──────────────────────────────────────────────────────

  describe('basic backend', () => {
    it('runs one full turn', async () => {
      const chat = new MockChatClient({ text: 'Sure thing.' });
      const h = harness({ chat: { kind: 'basic', client: chat }, language: 'en-US' });
      const session = new ConversationSession('test-session');

      const result = await h.cycle.run(session);

      expect(result).toEqual({
        status: 'completed',
        interrupted: false,
        transcript: 'Hello there',
        reply: 'Sure thing.',
      });
      expect(h.stt.languages).toEqual(['en-US']);
      expect(chat.calls).toEqual([
        { text: 'Hello there', options: { sessionId: 'test-session', debug: false } },
      ]);
      expect(h.tts.spoken).toEqual(['Sure thing.']);
      expect(h.cues.played).toEqual(['listening', 'processing', 'thinking', 'speaking']);
      expect(h.events).toEqual({
        transcription: ['Hello there'],
        sentence: ['Sure thing.'],
        response: ['Sure thing.'],
        interrupted: 0,
      });
    });

    it('forwards the debug flag', async () => {
      const chat = new MockChatClient();
      const h = harness({ chat: { kind: 'basic', client: chat }, debug: true });
      await h.cycle.run(new ConversationSession('test-session'));
      expect(chat.calls[0].options.debug).toBe(true);
    });

    it('adopts a conversation id issued by the backend', async () => {
      const chat = new MockChatClient({ text: 'Ok.', sessionId: 'conv-42' });
      const h = harness({ chat: { kind: 'basic', client: chat } });
      const session = new ConversationSession('test-session');

      await h.cycle.run(session);

      expect(session.id).toBe('conv-42');
    });

    it('speaks nothing for a blank reply', async () => {
      const chat = new MockChatClient({ text: '   ' });
      const h = harness({ chat: { kind: 'basic', client: chat } });

      const result = await h.cycle.run(new ConversationSession('test-session'));

      expect(result).toEqual({ status: 'completed', interrupted: false, transcript: 'Hello there', reply: '   ' });
      expect(h.tts.spoken).toEqual([]);
      expect(h.cues.played).toEqual(['listening', 'processing', 'thinking']);
      expect(h.events.response).toEqual(['   ']);
    });

    it('is interrupted when the user talks over the reply', async () => {
      const input = new FakeAudioInput([[]]);
      const tts = new MockTTS();
      tts.speakDelayMs = 10_000;
      tts.onSpeak = () => input.current?.push(loudFrame());
      const chat = new MockChatClient({ text: 'A long answer.' });
      const h = harness({ chat: { kind: 'basic', client: chat }, tts, input });

      const result = await h.cycle.run(new ConversationSession('test-session'));

      expect(result).toEqual({
        status: 'completed',
        interrupted: true,
        transcript: 'Hello there',
        reply: 'A long answer.',
      });
      expect(tts.spoken).toEqual(['A long answer.']);
      expect(tts.stopCalls).toBe(1);
      expect(h.events.sentence).toEqual([]);
      expect(h.events.interrupted).toBe(1);
      expect(input.current?.closed).toBe(true);
    });
  });

  // ─── Streaming backend ──────────────────────────────────────────────────

  describe('streaming backend', () => {
    it('speaks each sentence as it completes', async () => {
      const chat = new MockStreamingChatClient(['Hi', ' there.', ' How are you?']);
      const h = harness({ chat: { kind: 'streaming', client: chat } });

      const result = await h.cycle.run(new ConversationSession('test-session'));

      expect(h.tts.spoken).toEqual(['Hi there.', 'How are you?']);
      expect(h.events.sentence).toEqual(['Hi there.', 'How are you?']);
      expect(h.events.response).toEqual(['Hi there. How are you?']);
      expect(result).toEqual({
        status: 'completed',
        interrupted: false,
        transcript: 'Hello there',
        reply: 'Hi there. How are you?',
      });
      expect(h.cues.played).toEqual(['listening', 'processing', 'thinking', 'speaking']);
    });

    it('passes a cancellation signal that is released when the turn ends', async () => {
      const chat = new MockStreamingChatClient(['Done.']);
      const h = harness({ chat: { kind: 'streaming', client: chat } });

      await h.cycle.run(new ConversationSession('test-session'));

      const options = chat.calls[0].options;
      expect(options.sessionId).toBe('test-session');
      expect(options.signal?.aborted).toBe(true);
    });

    it('stops speaking and drops the stream on barge-in', async () => {
      const input = new FakeAudioInput([[]]);
      const tts = new MockTTS();
      tts.speakDelayMs = 10_000;
      tts.onSpeak = () => input.current?.push(loudFrame());
      const chat = new MockStreamingChatClient(['First sentence. ', 'Second sentence. ', 'Third.']);
      const h = harness({ chat: { kind: 'streaming', client: chat }, tts, input });

      const result = await h.cycle.run(new ConversationSession('test-session'));

      expect(tts.spoken).toEqual(['First sentence.']);
      expect(tts.stopCalls).toBe(1);
      expect(chat.yielded).toEqual(['First sentence. ']);
      expect(chat.closed).toBe(true);
      expect(h.events.sentence).toEqual([]);
      expect(h.events.response).toEqual(['First sentence. ']);
      expect(h.events.interrupted).toBe(1);
      expect(result).toEqual({
        status: 'completed',
        interrupted: true,
        transcript: 'Hello there',
        reply: 'First sentence. ',
      });
    });

    it('stops waiting on a stream that ignores the abort signal', async () => {
      const input = new FakeAudioInput([[]]);
      let resume: () => void = () => {};
      let streamClosed = false;
      const chat: StreamingChatClient = {
        chat: async () => ({ text: '' }),
        async *chatStream() {
          try {
            yield 'First sentence. ';
            // The user talks while the backend is stalled
            input.current?.push(loudFrame());
            await new Promise<void>((resolve) => { resume = resolve; });
            yield 'Second sentence.';
          } finally {
            streamClosed = true;
          }
        },
      };
      const h = harness({ chat: { kind: 'streaming', client: chat }, input });

      const result = await h.cycle.run(new ConversationSession('test-session'));

      expect(result).toEqual({
        status: 'completed',
        interrupted: true,
        transcript: 'Hello there',
        reply: 'First sentence. ',
      });
      expect(h.tts.spoken).toEqual(['First sentence.']);
      expect(h.tts.stopCalls).toBe(1);
      expect(h.events.interrupted).toBe(1);
      expect(streamClosed).toBe(false);

      resume();
      await vi.waitFor(() => expect(streamClosed).toBe(true));
      expect(h.tts.spoken).toEqual(['First sentence.']);
    });

    it('never opens the input when interruption is disabled', async () => {
      const input = new FakeAudioInput();
      const chat = new MockStreamingChatClient();
      const h = harness({ chat: { kind: 'streaming', client: chat }, input, allowInterruption: false });

      const result = await h.cycle.run(new ConversationSession('test-session'));

      expect(input.openCount).toBe(0);
      expect(result.status === 'completed' && result.interrupted).toBe(false);
      expect(h.tts.spoken).toEqual(['Hi there.', 'How are you?']);
    });

    it('aborts the turn when the stream fails', async () => {
      const chat = new MockStreamingChatClient(['Hi', ' there.']);
      chat.failAfter = 1;
      const h = harness({ chat: { kind: 'streaming', client: chat } });

      const result = await h.cycle.run(new ConversationSession('test-session'));

      expect(result.status).toBe('aborted');
      if (result.status !== 'aborted') return;
      expect(result.error).toBeInstanceOf(ChatClientError);
      expect(result.error.message).toBe('Chat request failed: stream broke');
      expect(h.tts.spoken).toEqual([]);
      expect(h.cues.played).toEqual(['listening', 'processing', 'thinking', 'speaking', 'error']);
    });
  });

  // ─── Empty input and failures ───────────────────────────────────────────

  it('skips the backend when nothing was said', async () => {
    const chat = new MockChatClient();
    const h = harness({ chat: { kind: 'basic', client: chat }, stt: new MockSTT(['   ']) });

    const result = await h.cycle.run(new ConversationSession('test-session'));

    expect(result).toEqual({ status: 'completed', interrupted: false });
    expect(chat.calls).toEqual([]);
    expect(h.tts.spoken).toEqual([]);
    expect(h.cues.played).toEqual(['listening', 'processing', 'error']);
    expect(h.events.transcription).toEqual([]);
  });

  it('reports a chat failure as an aborted turn', async () => {
    const chat = new MockChatClient();
    chat.error = new Error('backend down');
    const h = harness({ chat: { kind: 'basic', client: chat } });

    const result = await h.cycle.run(new ConversationSession('test-session'));

    expect(result.status).toBe('aborted');
    if (result.status !== 'aborted') return;
    expect(result.error).toBeInstanceOf(ChatClientError);
    expect(result.error.message).toBe('Chat request failed: backend down');
    expect(h.cues.played).toEqual(['listening', 'processing', 'thinking', 'error']);
  });

  it('keeps a typed chat error as it is', async () => {
    const chat = new MockChatClient();
    const error = new ChatClientError('Chat request failed (503): busy');
    chat.error = error;
    const h = harness({ chat: { kind: 'basic', client: chat } });

    const result = await h.cycle.run(new ConversationSession('test-session'));

    expect(result).toEqual({ status: 'aborted', error });
  });

  it('reports a recording failure', async () => {
    const recorder = new MockRecorder();
    recorder.error = new Error('mic unplugged');
    const h = harness({ chat: { kind: 'basic', client: new MockChatClient() }, recorder });

    const result = await h.cycle.run(new ConversationSession('test-session'));

    expect(result.status === 'aborted' && result.error).toBeInstanceOf(RecordingError);
    expect(h.stt.calls).toBe(0);
    expect(h.cues.played).toEqual(['listening', 'error']);
  });

  it('reports a transcription failure', async () => {
    const stt = new MockSTT();
    stt.error = new Error('model missing');
    const h = harness({ chat: { kind: 'basic', client: new MockChatClient() }, stt });

    const result = await h.cycle.run(new ConversationSession('test-session'));

    expect(result.status === 'aborted' && result.error.message).toBe('Transcription failed: model missing');
    expect(result.status === 'aborted' && result.error).toBeInstanceOf(TranscriptionError);
  });

  it('reports a speech synthesis failure', async () => {
    const tts = new MockTTS();
    tts.error = new Error('voice not found');
    const h = harness({ chat: { kind: 'basic', client: new MockChatClient() }, tts });

    const result = await h.cycle.run(new ConversationSession('test-session'));

    expect(result.status === 'aborted' && result.error).toBeInstanceOf(SpeechSynthesisError);
    expect(result.status === 'aborted' && result.error.message).toBe('Speech synthesis failed: voice not found');
  });

  it('ignores cue playback failures', async () => {
    const cues = new MockCues();
    cues.failing = true;
    const h = harness({ chat: { kind: 'basic', client: new MockChatClient() }, cues });

    const result = await h.cycle.run(new ConversationSession('test-session'));

    expect(result.status).toBe('completed');
    expect(h.tts.spoken).toEqual(['Sure thing.']);
  });

  it('propagates errors that do not come from a collaborator', async () => {
    const h = harness({ chat: { kind: 'basic', client: new MockChatClient() } });
    h.cycle.on('transcription', () => {
      throw new Error('listener bug');
    });

    await expect(h.cycle.run(new ConversationSession('test-session'))).rejects.toThrow('listener bug');
    expect(h.cycle.running).toBe(false);
  });

  it('refuses to run two turns at once', async () => {
    const h = harness({ chat: { kind: 'basic', client: new MockChatClient() } });
    const session = new ConversationSession('test-session');

    const first = h.cycle.run(session);
    await expect(h.cycle.run(session)).rejects.toThrow('InteractionCycle is already running');
    expect((await first).status).toBe('completed');
    expect(h.recorder.calls).toBe(1);
  });
});
