/**
 * InteractionCycle — one listen → transcribe → converse → speak turn.
 *
 * Streaming backends are spoken sentence by sentence while the reply is
 * still arriving, with barge-in detection covering the whole reply. Basic
 * backends are awaited in full and spoken as one utterance, with barge-in
 * detection covering only the speak call.
 *
 * Every turn gets its own CancellationSignal. Collaborator failures are
 * reported as an aborted TurnResult; anything else propagates.
 */

import { EventEmitter } from 'events';
import type {
  AudioCues,
  AudioInputDevice,
  AudioRecorder,
  CapturedUtterance,
  ChatBackend,
  ChatClient,
  CueName,
  CycleEvents,
  SpeechToText,
  StreamingChatClient,
  TextToSpeech,
  TurnResult,
} from './types';
import { CancellationSignal } from './cancellation-signal';
import { InterruptionMonitor } from './interruption-monitor';
import { SentenceSegmenter } from './sentence-segmenter';
import type { ConversationSession } from './session';
import {
  ChatClientError,
  CollaboratorError,
  RecordingError,
  SpeechSynthesisError,
  TranscriptionError,
  errorMessage,
  isAbortError,
} from './errors';
import { createLogger } from '../utils/logger';

const log = createLogger('InteractionCycle');

export interface InteractionCycleOptions {
  recorder: AudioRecorder;
  stt: SpeechToText;
  chat: ChatBackend;
  tts: TextToSpeech;
  /** Microphone used for barge-in detection (omit to disable it) */
  input?: AudioInputDevice;
  /** Audible state cues; cue failures never affect the turn */
  cues?: AudioCues;
  /** Language hint passed to STT (e.g. 'en-US') */
  language?: string;
  /** Forwarded to the chat backend on every request */
  debug?: boolean;
  /** Let the user cut synthesized speech short (default: true) */
  allowInterruption?: boolean;
  /** Barge-in energy threshold (default: 0.02) */
  interruptionThreshold?: number;
  /** Frame wait used by the barge-in read loop (default: 50ms) */
  monitorPollIntervalMs?: number;
}

function preview(text: string, max = 60): string {
  return text.length > max ? `${text.slice(0, max)}...` : text;
}

function asChatError(err: unknown): ChatClientError {
  if (err instanceof ChatClientError) return err;
  return new ChatClientError(`Chat request failed: ${errorMessage(err)}`, { cause: err });
}

/**
 * Hand back the iterator of an abandoned stream. With a read still
 * outstanding the iterator is released once that read settles; the turn
 * does not wait for it.
 */
async function releaseStream(
  iterator: AsyncIterator<string>,
  pending: Promise<IteratorResult<string>> | null,
): Promise<void> {
  if (!pending) {
    await iterator.return?.();
    return;
  }
  pending
    .then(() => iterator.return?.())
    .catch((err: unknown) => {
      log.debug(`Chat stream settled after interruption: ${errorMessage(err)}`);
    });
}

function openStream(open: () => AsyncIterable<string>): AsyncIterator<string> {
  try {
    return open()[Symbol.asyncIterator]();
  } catch (err) {
    throw asChatError(err);
  }
}

/**
 * Re-yield a backend stream, converting its failures to ChatClientError.
 *
 * Each read is raced against the cancellation token, so a backend that
 * ignores the abort signal cannot hold the turn open after a barge-in.
 * An abort caused by our own cancellation just ends the stream.
 */
async function* guardChatStream(
  open: () => AsyncIterable<string>,
  cancel: CancellationSignal,
): AsyncGenerator<string> {
  const iterator = openStream(open);

  let unsubscribe: () => void = () => {};
  const fired = new Promise<null>((resolve) => {
    unsubscribe = cancel.onFire(() => resolve(null));
  });

  let pending: Promise<IteratorResult<string>> | null = null;
  let finished = false;

  try {
    while (!cancel.fired) {
      pending = iterator.next();
      const result = await Promise.race([pending, fired]);
      if (result === null) break;
      pending = null;

      if (result.done) {
        finished = true;
        return;
      }
      yield result.value;
    }
    log.debug('Stopped reading chat stream after interruption');
  } catch (err) {
    finished = true;
    if (cancel.fired && isAbortError(err)) {
      log.debug('Chat stream aborted after interruption');
      return;
    }
    throw asChatError(err);
  } finally {
    unsubscribe();
    if (!finished) await releaseStream(iterator, pending);
  }
}

export interface InteractionCycle {
  on<E extends keyof CycleEvents>(event: E, listener: CycleEvents[E]): this;
  once<E extends keyof CycleEvents>(event: E, listener: CycleEvents[E]): this;
  off<E extends keyof CycleEvents>(event: E, listener: CycleEvents[E]): this;
  emit<E extends keyof CycleEvents>(event: E, ...args: Parameters<CycleEvents[E]>): boolean;
}

export class InteractionCycle extends EventEmitter {
  private readonly recorder: AudioRecorder;
  private readonly stt: SpeechToText;
  private readonly chat: ChatBackend;
  private readonly tts: TextToSpeech;
  private readonly cues: AudioCues | undefined;
  private readonly language: string | undefined;
  private readonly debug: boolean;
  private readonly monitor: InterruptionMonitor | null;

  private _running = false;

  constructor(options: InteractionCycleOptions) {
    super();
    this.recorder = options.recorder;
    this.stt = options.stt;
    this.chat = options.chat;
    this.tts = options.tts;
    this.cues = options.cues;
    this.language = options.language;
    this.debug = options.debug ?? false;

    this.monitor = options.allowInterruption === false
      ? null
      : new InterruptionMonitor(options.input, {
        threshold: options.interruptionThreshold,
        pollIntervalMs: options.monitorPollIntervalMs,
        onInterrupt: () => this.tts.stop(),
      });

    if (this.chat.kind === 'streaming') {
      log.info('Chat backend streams — speaking replies sentence by sentence');
    }
  }

  get running(): boolean {
    return this._running;
  }

  async run(session: ConversationSession): Promise<TurnResult> {
    if (this._running) {
      throw new Error('InteractionCycle is already running');
    }
    this._running = true;
    try {
      return await this.runTurn(session);
    } finally {
      this._running = false;
    }
  }

  private async runTurn(session: ConversationSession): Promise<TurnResult> {
    const cancel = new CancellationSignal();

    try {
      await this.cue('listening');
      const utterance = await this.record();
      await this.cue('processing');

      const transcript = await this.transcribe(utterance);
      if (!transcript) {
        log.warn('No speech captured — try again');
        await this.cue('error');
        return { status: 'completed', interrupted: false };
      }

      log.info(`User said: "${transcript}"`);
      this.emit('transcription', transcript);
      await this.cue('thinking');

      const reply = this.chat.kind === 'streaming'
        ? await this.speakStreamingReply(this.chat.client, transcript, session, cancel)
        : await this.speakWholeReply(this.chat.client, transcript, session, cancel);

      if (cancel.fired) {
        log.info('Turn interrupted by the user');
        this.emit('interrupted');
      }

      return { status: 'completed', interrupted: cancel.fired, transcript, reply };
    } catch (err) {
      if (!(err instanceof CollaboratorError)) throw err;
      log.error(`Turn aborted — ${err.name}: ${err.message}`);
      await this.cue('error');
      return { status: 'aborted', error: err };
    } finally {
      // Nothing may outlive the turn that owns it
      cancel.fire('turn-ended');
    }
  }

  private async record(): Promise<CapturedUtterance> {
    log.debug('Recording utterance...');
    try {
      return await this.recorder.record();
    } catch (err) {
      if (err instanceof CollaboratorError) throw err;
      throw new RecordingError(`Recording failed: ${errorMessage(err)}`, { cause: err });
    }
  }

  private async transcribe(utterance: CapturedUtterance): Promise<string> {
    log.debug(`Transcribing ${utterance.pcm.length} samples @ ${utterance.sampleRate}Hz...`);
    try {
      const text = await this.stt.transcribe(utterance, this.language);
      return text.trim();
    } catch (err) {
      if (err instanceof CollaboratorError) throw err;
      throw new TranscriptionError(`Transcription failed: ${errorMessage(err)}`, { cause: err });
    }
  }

  private async speakWholeReply(
    client: ChatClient,
    transcript: string,
    session: ConversationSession,
    cancel: CancellationSignal,
  ): Promise<string> {
    let reply;
    try {
      reply = await client.chat(transcript, { sessionId: session.id, debug: this.debug });
    } catch (err) {
      throw asChatError(err);
    }

    session.adopt(reply.sessionId);
    log.info(`Reply: "${preview(reply.text)}"`);
    this.emit('response', reply.text);

    const text = reply.text.trim();
    if (!text) {
      log.warn('Chat backend returned an empty reply');
      return reply.text;
    }

    await this.cue('speaking');
    await this.withMonitor(cancel, () => this.speak(text, cancel));
    return reply.text;
  }

  private async speakStreamingReply(
    client: StreamingChatClient,
    transcript: string,
    session: ConversationSession,
    cancel: CancellationSignal,
  ): Promise<string> {
    const segmenter = new SentenceSegmenter();
    let fullText = '';

    await this.cue('speaking');
    await this.withMonitor(cancel, async () => {
      const chunks = guardChatStream(
        () => client.chatStream(transcript, {
          sessionId: session.id,
          debug: this.debug,
          signal: cancel.signal,
        }),
        cancel,
      );

      for await (const chunk of chunks) {
        if (cancel.fired) break;
        fullText += chunk;

        for (const sentence of segmenter.add(chunk)) {
          if (cancel.fired) break;
          await this.speak(sentence, cancel);
        }
      }

      if (!cancel.fired) {
        const remaining = segmenter.flush();
        if (remaining) {
          await this.speak(remaining, cancel);
        }
      }
    });

    if (fullText.trim()) {
      this.emit('response', fullText);
    } else if (!cancel.fired) {
      log.warn('Chat stream produced no text');
    }
    return fullText;
  }

  private async withMonitor(cancel: CancellationSignal, task: () => Promise<void>): Promise<void> {
    if (!this.monitor) {
      await task();
      return;
    }
    await this.monitor.watch(cancel, task);
  }

  private async speak(text: string, cancel: CancellationSignal): Promise<void> {
    if (cancel.fired) return;
    log.info(`Speaking: "${preview(text)}"`);
    try {
      await this.tts.speak(text);
    } catch (err) {
      if (err instanceof CollaboratorError) throw err;
      throw new SpeechSynthesisError(`Speech synthesis failed: ${errorMessage(err)}`, { cause: err });
    }
    if (!cancel.fired) {
      this.emit('sentence', text);
    }
  }

  private async cue(name: CueName): Promise<void> {
    if (!this.cues) return;
    try {
      await this.cues.play(name);
    } catch (err) {
      log.debug(`Cue "${name}" failed:`, err);
    }
  }
}
