/**
 * createAssistant — builds a ready-to-run SessionController from config.
 *
 * Console mode types instead of talking: no microphone, so no barge-in,
 * and the follow-up window is skipped unless one is configured. Audio mode
 * records and plays through external commands; speech runs on an HTTP or
 * Wyoming service, or on a local piper binary for synthesis.
 */

import type {
  AudioCues,
  AudioInputDevice,
  AudioPlayer,
  AudioRecorder,
  ChatBackend,
  SpeechToText,
  TextToSpeech,
  WakeWordDetector,
} from './core/types';
import { DEFAULT_FOLLOW_UP_TIMEOUT_MS, SessionController } from './core/session-controller';
import { ConfigError } from './core/errors';
import type { AssistantConfig } from './config';
import {
  ConsolePrompt,
  ConsoleRecorder,
  ConsoleTextToSpeech,
  ConsoleWakeWordDetector,
  EchoSpeechToText,
} from './providers/console';
import { HttpChatClient } from './providers/http-chat';
import { OpenAIChatClient } from './providers/openai-chat';
import { GatewayChatClient } from './providers/gateway-chat';
import { RemoteSpeechToText } from './providers/remote-stt';
import { RemoteTextToSpeech } from './providers/remote-tts';
import { WyomingSpeechToText } from './providers/wyoming-stt';
import { WyomingTextToSpeech } from './providers/wyoming-tts';
import { PiperTextToSpeech } from './providers/piper-tts';
import { EnergyRecorder } from './providers/energy-recorder';
import { CommandAudioInput, CommandAudioPlayer, parseCommand } from './audio/command-devices';
import { ToneCues } from './audio/tone-cues';
import { createLogger } from './utils/logger';

const log = createLogger('Assistant');

export interface Assistant {
  controller: SessionController;
  /** Unblocks a pending console read so the wake detector reports shutdown. */
  requestShutdown(): void;
  /** Release sockets and prompts. */
  close(): void;
}

export interface AssistantOverrides {
  /** Replace the console streams (tests) */
  prompt?: ConsolePrompt;
  /** Replace the chat backend built from config */
  chat?: ChatBackend;
}

export function createChatBackend(config: AssistantConfig): { backend: ChatBackend; close: () => void } {
  const { chat } = config;
  switch (chat.backend) {
    case 'http':
      return {
        backend: { kind: 'basic', client: new HttpChatClient({ baseUrl: chat.url, token: chat.token, timeoutMs: chat.timeoutMs }) },
        close: () => {},
      };
    case 'openai':
      return {
        backend: {
          kind: 'streaming',
          client: new OpenAIChatClient({
            baseUrl: chat.url,
            token: chat.token,
            model: chat.model,
            systemPrompt: chat.systemPrompt,
            timeoutMs: chat.timeoutMs,
          }),
        },
        close: () => {},
      };
    case 'gateway': {
      const client = new GatewayChatClient({ url: chat.url, token: chat.token, timeoutMs: chat.timeoutMs });
      return { backend: { kind: 'streaming', client }, close: () => client.close() };
    }
  }
}

interface Collaborators {
  wake: WakeWordDetector;
  recorder: AudioRecorder;
  stt: SpeechToText;
  tts: TextToSpeech;
  input?: AudioInputDevice;
  cues?: AudioCues;
}

function consoleCollaborators(config: AssistantConfig, prompt: ConsolePrompt): Collaborators {
  return {
    wake: new ConsoleWakeWordDetector(prompt, { keyword: config.wakeWord }),
    recorder: new ConsoleRecorder(prompt),
    stt: new EchoSpeechToText(),
    tts: new ConsoleTextToSpeech(prompt.output),
  };
}

export function createSpeechToText(config: AssistantConfig): SpeechToText {
  const { audio } = config;
  if (audio.sttMode === 'wyoming') {
    return new WyomingSpeechToText({
      host: audio.wyoming.sttHost,
      port: audio.wyoming.sttPort,
      timeoutMs: config.chat.timeoutMs,
    });
  }
  if (!audio.sttUrl) {
    throw new ConfigError('WAKELINE_STT_URL is required in audio mode');
  }
  return new RemoteSpeechToText({ baseUrl: audio.sttUrl, timeoutMs: config.chat.timeoutMs });
}

export function createTextToSpeech(config: AssistantConfig, player: AudioPlayer): TextToSpeech {
  const { audio } = config;
  switch (audio.ttsMode) {
    case 'wyoming':
      return new WyomingTextToSpeech({
        player,
        host: audio.wyoming.ttsHost,
        port: audio.wyoming.ttsPort,
        speaker: audio.ttsSpeaker,
        sampleRate: audio.ttsSampleRate,
        timeoutMs: config.chat.timeoutMs,
      });
    case 'local':
      if (!audio.piper.model) {
        throw new ConfigError('WAKELINE_PIPER_MODEL is required for local speech synthesis');
      }
      return new PiperTextToSpeech({
        model: audio.piper.model,
        binary: audio.piper.binary,
        player,
        speaker: audio.ttsSpeaker,
        sampleRate: audio.ttsSampleRate,
      });
    case 'remote':
      if (!audio.ttsUrl) {
        throw new ConfigError('WAKELINE_TTS_URL is required in audio mode');
      }
      return new RemoteTextToSpeech({
        baseUrl: audio.ttsUrl,
        player,
        speaker: audio.ttsSpeaker,
        sampleRate: audio.ttsSampleRate,
        timeoutMs: config.chat.timeoutMs,
      });
  }
}

function audioCollaborators(config: AssistantConfig, prompt: ConsolePrompt): Collaborators {
  const { audio } = config;
  const stt = createSpeechToText(config);

  const input = new CommandAudioInput({
    command: audio.recordCommand ? parseCommand(audio.recordCommand) : undefined,
  });
  const player = new CommandAudioPlayer({
    command: audio.playCommand ? parseCommand(audio.playCommand) : undefined,
  });

  return {
    // Wake stays on the keyboard; acoustic wake word detection is not built in
    wake: new ConsoleWakeWordDetector(prompt, { keyword: config.wakeWord }),
    recorder: new EnergyRecorder({
      input,
      sampleRate: input.sampleRate,
      silenceSeconds: audio.silenceSeconds,
      maxSeconds: audio.maxRecordSeconds,
    }),
    stt,
    tts: createTextToSpeech(config, player),
    input,
    cues: audio.feedback ? new ToneCues(player) : undefined,
  };
}

export function createAssistant(config: AssistantConfig, overrides: AssistantOverrides = {}): Assistant {
  const prompt = overrides.prompt ?? new ConsolePrompt();
  const chat = overrides.chat
    ? { backend: overrides.chat, close: () => {} }
    : createChatBackend(config);

  const parts = config.mode === 'audio'
    ? audioCollaborators(config, prompt)
    : consoleCollaborators(config, prompt);

  log.info(`Mode: ${config.mode}, chat backend: ${config.chat.backend} (${chat.backend.kind})`);

  const controller = new SessionController({
    ...parts,
    chat: chat.backend,
    language: config.session.language,
    debug: config.chat.debug,
    sessionId: config.session.id,
    allowInterruption: config.interruption.allow,
    interruptionThreshold: config.interruption.threshold,
    // Without a microphone the window is a plain pause; skip it unless asked for
    followUpTimeoutMs: config.session.followUpTimeoutMs ?? (parts.input ? DEFAULT_FOLLOW_UP_TIMEOUT_MS : 0),
  });

  return {
    controller,
    requestShutdown: () => prompt.close(),
    close: () => {
      prompt.close();
      chat.close();
    },
  };
}
