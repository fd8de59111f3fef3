/**
 * Voice assistant on a Linux box with ALSA: records with arecord, plays with
 * aplay, and talks to HTTP speech services plus an agent gateway.
 *
 * Usage:
 *   STT_URL=http://localhost:9000 TTS_URL=http://localhost:5000 \
 *   GATEWAY_URL=ws://localhost:18789 GATEWAY_TOKEN=... \
 *   npx tsx examples/audio-assistant.ts
 */

import { CommandAudioInput, CommandAudioPlayer, ConfigError, SessionController, ToneCues } from '../src';
import {
  ConsolePrompt,
  ConsoleWakeWordDetector,
  EnergyRecorder,
  GatewayChatClient,
  RemoteSpeechToText,
  RemoteTextToSpeech,
} from '../src/providers';

function required(name: string): string {
  const value = process.env[name];
  if (!value) throw new ConfigError(`${name} is required`);
  return value;
}

const input = new CommandAudioInput({ sampleRate: 16000 });
const player = new CommandAudioPlayer();
const prompt = new ConsolePrompt();
const gateway = new GatewayChatClient({
  url: required('GATEWAY_URL'),
  token: process.env.GATEWAY_TOKEN,
});

const controller = new SessionController({
  wake: new ConsoleWakeWordDetector(prompt),
  recorder: new EnergyRecorder({ input, sampleRate: input.sampleRate, silenceSeconds: 1 }),
  stt: new RemoteSpeechToText({ baseUrl: required('STT_URL') }),
  chat: { kind: 'streaming', client: gateway },
  tts: new RemoteTextToSpeech({ baseUrl: required('TTS_URL'), player }),
  input,
  cues: new ToneCues(player),
  language: 'en-US',
  followUpTimeoutMs: 8_000,
});

controller.on('transcription', (text: string) => {
  console.log(`[You]: ${text}`);
});

controller.on('response', (text: string) => {
  console.log(`[Assistant]: ${text}`);
});

controller.on('interrupted', () => {
  console.log('(interrupted)');
});

controller.run()
  .catch((err: unknown) => {
    console.error('Assistant failed:', err);
    process.exitCode = 1;
  })
  .finally(() => {
    prompt.close();
    gateway.close();
  });
