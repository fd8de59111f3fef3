/**
 * wakeline — turn-taking engine for wake-word voice assistants.
 *
 * Quick start:
 * ```ts
 * import { SessionController } from 'wakeline';
 * import { ConsolePrompt, ConsoleWakeWordDetector, ConsoleRecorder, EchoSpeechToText,
 *   ConsoleTextToSpeech, HttpChatClient } from 'wakeline/providers';
 *
 * const prompt = new ConsolePrompt();
 * const controller = new SessionController({
 *   wake: new ConsoleWakeWordDetector(prompt),
 *   recorder: new ConsoleRecorder(prompt),
 *   stt: new EchoSpeechToText(),
 *   chat: { kind: 'basic', client: new HttpChatClient({ baseUrl: 'http://localhost:8000' }) },
 *   tts: new ConsoleTextToSpeech(),
 * });
 *
 * controller.on('response', (text) => console.log(text));
 * await controller.run();
 * ```
 *
 * Concrete collaborators live in `wakeline/providers`; anything implementing
 * the interfaces in `core/types` can stand in for them.
 */

// Core
export { SessionController, DEFAULT_FOLLOW_UP_TIMEOUT_MS } from './core/session-controller';
export type { SessionControllerConfig } from './core/session-controller';
export { InteractionCycle } from './core/interaction-cycle';
export type { InteractionCycleOptions } from './core/interaction-cycle';
export { SentenceSegmenter } from './core/sentence-segmenter';
export { CancellationSignal } from './core/cancellation-signal';
export { InterruptionMonitor } from './core/interruption-monitor';
export type { InterruptionMonitorOptions, MonitorHandle } from './core/interruption-monitor';
export { FollowUpListener } from './core/follow-up-listener';
export type { FollowUpListenerOptions } from './core/follow-up-listener';
export { ConversationSession } from './core/session';

// Errors
export {
  CollaboratorError,
  ChatClientError,
  TranscriptionError,
  RecordingError,
  SpeechSynthesisError,
  ConfigError,
  isAbortError,
} from './core/errors';

// Audio
export { FrameQueue } from './audio/frame-queue';
export { CommandAudioInput, CommandAudioPlayer, parseCommand } from './audio/command-devices';
export type { CommandAudioInputOptions, CommandAudioPlayerOptions } from './audio/command-devices';
export { ToneCues } from './audio/tone-cues';
export { encodeWav, decodeWav } from './audio/wav';
export type { DecodedWav } from './audio/wav';
export {
  DEFAULT_SPEECH_THRESHOLD,
  meanAbsoluteAmplitude,
  pcm16ToFloat32,
  float32ToPcm16,
  downmixPcm16,
} from './audio/pcm';

// Assembly
export { createAssistant, createChatBackend, createSpeechToText, createTextToSpeech } from './assistant';
export type { Assistant, AssistantOverrides } from './assistant';
export { loadConfig } from './config';
export type {
  AssistantConfig,
  AssistantMode,
  ChatBackendKind,
  SpeechToTextMode,
  TextToSpeechMode,
} from './config';

// Types
export type {
  CapturedUtterance,
  AudioFrameSource,
  AudioInputDevice,
  AudioPlayer,
  AudioCues,
  CueName,
  WakeWordDetector,
  AudioRecorder,
  SpeechToText,
  TextToSpeech,
  ChatRequestOptions,
  ChatStreamOptions,
  ChatReply,
  ChatClient,
  StreamingChatClient,
  ChatBackend,
  TurnResult,
  SessionState,
  CycleEvents,
  SessionEvents,
} from './core/types';

// Utils
export { Channel } from './utils/channel';
export type { ChannelOptions } from './utils/channel';
export { createLogger, setLogLevel, getLogLevel } from './utils/logger';
export type { LogLevel, Logger } from './utils/logger';
