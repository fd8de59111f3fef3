/**
 * Assistant configuration, read from WAKELINE_* environment variables.
 *
 * The CLI loads a `.env` file first (dotenv), so the same names work there.
 */

import { ConfigError } from './core/errors';
import { isLogLevel, type LogLevel } from './utils/logger';

export type AssistantMode = 'console' | 'audio';
export type ChatBackendKind = 'http' | 'openai' | 'gateway';
/** `remote`: HTTP service; `wyoming`: Wyoming TCP service */
export type SpeechToTextMode = 'remote' | 'wyoming';
/** `remote`: HTTP service; `wyoming`: Wyoming TCP service; `local`: the piper binary */
export type TextToSpeechMode = 'remote' | 'wyoming' | 'local';

export interface AssistantConfig {
  mode: AssistantMode;
  chat: {
    backend: ChatBackendKind;
    url: string;
    token?: string;
    model?: string;
    systemPrompt?: string;
    timeoutMs: number;
    debug: boolean;
  };
  session: {
    id?: string;
    /** Unset: 12s in audio mode, none in console mode */
    followUpTimeoutMs?: number;
    language?: string;
  };
  wakeWord: string;
  interruption: {
    allow: boolean;
    threshold: number;
  };
  audio: {
    feedback: boolean;
    sttMode: SpeechToTextMode;
    ttsMode: TextToSpeechMode;
    sttUrl?: string;
    ttsUrl?: string;
    ttsSpeaker?: string;
    /** Unset: each speech engine's own default */
    ttsSampleRate?: number;
    wyoming: {
      sttHost: string;
      sttPort: number;
      ttsHost: string;
      ttsPort: number;
    };
    piper: {
      model?: string;
      binary: string;
    };
    maxRecordSeconds: number;
    silenceSeconds: number;
    recordCommand?: string;
    playCommand?: string;
  };
  logLevel?: LogLevel;
}

type Env = Record<string, string | undefined>;

const PREFIX = 'WAKELINE_';

class EnvReader {
  private readonly env: Env;

  constructor(env: Env) {
    this.env = env;
  }

  string(name: string): string | undefined {
    const value = this.env[PREFIX + name]?.trim();
    return value ? value : undefined;
  }

  number(name: string, fallback: number, { min = 0 }: { min?: number } = {}): number {
    const raw = this.string(name);
    if (raw === undefined) return fallback;
    const value = Number(raw);
    if (!Number.isFinite(value) || value < min) {
      throw new ConfigError(`${PREFIX}${name} must be a number >= ${min} (got "${raw}")`);
    }
    return value;
  }

  optionalNumber(name: string, { min = 0 }: { min?: number } = {}): number | undefined {
    return this.string(name) === undefined ? undefined : this.number(name, min, { min });
  }

  port(name: string, fallback: number): number {
    const value = this.number(name, fallback, { min: 1 });
    if (!Number.isInteger(value) || value > 65535) {
      throw new ConfigError(`${PREFIX}${name} must be a TCP port (got "${this.string(name) ?? value}")`);
    }
    return value;
  }

  boolean(name: string, fallback: boolean): boolean {
    const raw = this.string(name)?.toLowerCase();
    if (raw === undefined) return fallback;
    if (['1', 'true', 'yes', 'on'].includes(raw)) return true;
    if (['0', 'false', 'no', 'off'].includes(raw)) return false;
    throw new ConfigError(`${PREFIX}${name} must be a boolean (got "${raw}")`);
  }

  oneOf<T extends string>(name: string, allowed: readonly T[], fallback: T): T {
    const raw = this.string(name)?.toLowerCase();
    if (raw === undefined) return fallback;
    const match = allowed.find((option) => option === raw);
    if (!match) {
      throw new ConfigError(`${PREFIX}${name} must be one of ${allowed.join(', ')} (got "${raw}")`);
    }
    return match;
  }
}

const MODES = ['console', 'audio'] as const;
const BACKENDS = ['http', 'openai', 'gateway'] as const;
const STT_MODES = ['remote', 'wyoming'] as const;
const TTS_MODES = ['remote', 'wyoming', 'local'] as const;

const DEFAULT_CHAT_URLS: Record<ChatBackendKind, string> = {
  http: 'http://localhost:8000',
  openai: 'http://localhost:18789',
  gateway: 'ws://localhost:18789',
};

export function loadConfig(env: Env = process.env): AssistantConfig {
  const read = new EnvReader(env);

  const backend = read.oneOf('CHAT_BACKEND', BACKENDS, 'http');

  let logLevel: LogLevel | undefined;
  const rawLevel = read.string('LOG_LEVEL')?.toLowerCase();
  if (rawLevel !== undefined) {
    if (!isLogLevel(rawLevel)) {
      throw new ConfigError(`${PREFIX}LOG_LEVEL must be one of debug, info, warn, error, silent (got "${rawLevel}")`);
    }
    logLevel = rawLevel;
  }

  const threshold = read.number('INTERRUPTION_THRESHOLD', 0.02);
  if (threshold > 1) {
    throw new ConfigError(`${PREFIX}INTERRUPTION_THRESHOLD must be between 0 and 1 (got ${threshold})`);
  }

  return {
    mode: read.oneOf('MODE', MODES, 'console'),
    chat: {
      backend,
      url: read.string('CHAT_URL') ?? DEFAULT_CHAT_URLS[backend],
      token: read.string('CHAT_TOKEN'),
      model: read.string('CHAT_MODEL'),
      systemPrompt: read.string('SYSTEM_PROMPT'),
      timeoutMs: read.number('REQUEST_TIMEOUT_MS', 30_000, { min: 1 }),
      debug: read.boolean('DEBUG_CHAT', false),
    },
    session: {
      id: read.string('SESSION_ID'),
      followUpTimeoutMs: read.optionalNumber('FOLLOW_UP_TIMEOUT_MS'),
      language: read.string('LANGUAGE'),
    },
    wakeWord: read.string('WAKE_WORD') ?? 'hey wakeline',
    interruption: {
      allow: read.boolean('ALLOW_INTERRUPTION', true),
      threshold,
    },
    audio: {
      feedback: read.boolean('AUDIO_FEEDBACK', true),
      sttMode: read.oneOf('STT_MODE', STT_MODES, 'remote'),
      ttsMode: read.oneOf('TTS_MODE', TTS_MODES, 'remote'),
      sttUrl: read.string('STT_URL'),
      ttsUrl: read.string('TTS_URL'),
      ttsSpeaker: read.string('TTS_SPEAKER'),
      ttsSampleRate: read.optionalNumber('TTS_SAMPLE_RATE', { min: 1 }),
      wyoming: {
        sttHost: read.string('WYOMING_STT_HOST') ?? 'localhost',
        sttPort: read.port('WYOMING_STT_PORT', 10300),
        ttsHost: read.string('WYOMING_TTS_HOST') ?? 'localhost',
        ttsPort: read.port('WYOMING_TTS_PORT', 10200),
      },
      piper: {
        model: read.string('PIPER_MODEL'),
        binary: read.string('PIPER_BINARY') ?? 'piper',
      },
      maxRecordSeconds: read.number('MAX_RECORD_SECONDS', 30, { min: 1 }),
      silenceSeconds: read.number('SILENCE_SECONDS', 1.2),
      recordCommand: read.string('RECORD_COMMAND'),
      playCommand: read.string('PLAY_COMMAND'),
    },
    logLevel,
  };
}
