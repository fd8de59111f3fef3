// ─── Audio ───────────────────────────────────────────────────────────────────

/**
 * One recorded utterance: single-channel PCM16 at `sampleRate`.
 * Produced once per recording and handed to transcription exactly once.
 */
export interface CapturedUtterance {
  readonly pcm: Int16Array;
  readonly sampleRate: number;
  /** Typed text standing in for audio (console harness only). */
  readonly transcriptHint?: string;
}

/**
 * Pull side of an open input stream. Samples are normalized to [-1, 1].
 * A source has a single reader at any instant.
 */
export interface AudioFrameSource {
  /** Next frame, or null when none arrives within `timeoutMs` or the source is closed. */
  nextFrame(timeoutMs: number): Promise<Float32Array | null>;
  /** True once the stream has ended, whether closed by the reader or the driver. */
  readonly closed: boolean;
  close(): void;
}

export interface AudioInputDevice {
  /** Open a fresh input stream. Throws when the device is unavailable. */
  open(): AudioFrameSource;
}

export interface AudioPlayer {
  /** Play PCM16 mono audio; resolves when playback ends or is stopped. */
  play(pcm: Int16Array, sampleRate: number): Promise<void>;
  /** Halt the current playback immediately. No-op when idle. */
  stop(): void;
}

export type CueName = 'listening' | 'processing' | 'thinking' | 'speaking' | 'error';

export interface AudioCues {
  play(cue: CueName): Promise<void>;
}

// ─── Collaborators ───────────────────────────────────────────────────────────

export interface WakeWordDetector {
  /** Resolves true on wake, false when the assistant should shut down. */
  awaitWake(): Promise<boolean>;
}

export interface AudioRecorder {
  /** Resolves with one utterance; endpointing is the recorder's job. */
  record(): Promise<CapturedUtterance>;
}

export interface SpeechToText {
  /** May resolve to '' when nothing intelligible was said. */
  transcribe(utterance: CapturedUtterance, language?: string): Promise<string>;
}

export interface TextToSpeech {
  /** Resolves when the text has been spoken (or playback was stopped). */
  speak(text: string): Promise<void>;
  /** Ask the current speak() call to end playback now. */
  stop(): void;
}

// ─── Chat ────────────────────────────────────────────────────────────────────

export interface ChatRequestOptions {
  sessionId: string;
  debug: boolean;
}

export interface ChatStreamOptions extends ChatRequestOptions {
  /** Aborted when the turn is cancelled; the client should drop the request. */
  signal?: AbortSignal;
}

export interface ChatReply {
  text: string;
  /** Replacement conversation id, when the backend issues one. */
  sessionId?: string;
}

export interface ChatClient {
  chat(text: string, options: ChatRequestOptions): Promise<ChatReply>;
}

export interface StreamingChatClient extends ChatClient {
  /** Finite, single-pass stream of text chunks. Errors surface during iteration. */
  chatStream(text: string, options: ChatStreamOptions): AsyncIterable<string>;
}

/** Which chat path the cycle uses, decided once at wiring time. */
export type ChatBackend =
  | { kind: 'basic'; client: ChatClient }
  | { kind: 'streaming'; client: StreamingChatClient };

// ─── Turns ───────────────────────────────────────────────────────────────────

export type TurnResult =
  | { status: 'completed'; interrupted: boolean; transcript?: string; reply?: string }
  | { status: 'aborted'; error: Error };

export type SessionState =
  | 'waiting_for_wake'
  | 'in_session'
  | 'listening_for_followup'
  | 'shutdown';

// ─── Events ──────────────────────────────────────────────────────────────────

export interface CycleEvents {
  transcription: (text: string) => void;
  /** Emitted after each sentence has been handed to TTS and returned. */
  sentence: (text: string) => void;
  /** Full reply text as received from the backend (spoken or not). */
  response: (text: string) => void;
  interrupted: () => void;
}

export interface SessionEvents extends CycleEvents {
  state: (state: SessionState) => void;
  session: (sessionId: string) => void;
  aborted: (error: Error) => void;
}
