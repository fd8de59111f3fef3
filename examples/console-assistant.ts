/**
 * Console assistant example: type your side of the conversation, read the
 * replies. Streams from any OpenAI-compatible endpoint.
 *
 * Usage:
 *   CHAT_URL=http://localhost:18789 CHAT_TOKEN=... npx tsx examples/console-assistant.ts
 */

import { SessionController, setLogLevel, type SessionState } from '../src';
import {
  ConsolePrompt,
  ConsoleRecorder,
  ConsoleTextToSpeech,
  ConsoleWakeWordDetector,
  EchoSpeechToText,
  OpenAIChatClient,
} from '../src/providers';

setLogLevel('warn');

const prompt = new ConsolePrompt();

const controller = new SessionController({
  wake: new ConsoleWakeWordDetector(prompt, { keyword: 'hey assistant' }),
  recorder: new ConsoleRecorder(prompt),
  stt: new EchoSpeechToText(),
  chat: {
    kind: 'streaming',
    client: new OpenAIChatClient({
      baseUrl: process.env.CHAT_URL ?? 'http://localhost:18789',
      token: process.env.CHAT_TOKEN,
      systemPrompt: 'You are a helpful voice assistant. Keep replies short and conversational.',
    }),
  },
  tts: new ConsoleTextToSpeech(),
  // No microphone to listen with
  followUpTimeoutMs: 0,
});

// Event listeners
controller.on('state', (state: SessionState) => {
  console.log(`[state] ${state}`);
});

controller.on('session', (id: string) => {
  console.log(`[session] ${id}`);
});

controller.on('aborted', (error: Error) => {
  console.error('Turn aborted:', error.message);
});

process.on('SIGINT', () => prompt.close());

controller.run()
  .then(() => prompt.close())
  .catch((err: unknown) => {
    console.error('Assistant failed:', err);
    process.exit(1);
  });
