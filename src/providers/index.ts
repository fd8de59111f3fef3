export {
  ConsolePrompt,
  ConsoleWakeWordDetector,
  ConsoleRecorder,
  EchoSpeechToText,
  ConsoleTextToSpeech,
} from './console';
export type { ConsolePromptOptions, ConsoleWakeWordDetectorOptions } from './console';

export { HttpChatClient, extractReplyText, extractConversationId } from './http-chat';
export type { HttpChatClientOptions } from './http-chat';

export { OpenAIChatClient } from './openai-chat';
export type { OpenAIChatClientOptions } from './openai-chat';

export { GatewayChatClient } from './gateway-chat';
export type { GatewayChatClientOptions } from './gateway-chat';

export { RemoteSpeechToText } from './remote-stt';
export type { RemoteSpeechToTextOptions } from './remote-stt';

export { RemoteTextToSpeech } from './remote-tts';
export type { RemoteTextToSpeechOptions } from './remote-tts';

export { EnergyRecorder } from './energy-recorder';
export type { EnergyRecorderOptions } from './energy-recorder';

export { WyomingSpeechToText } from './wyoming-stt';
export type { WyomingSpeechToTextOptions } from './wyoming-stt';

export { WyomingTextToSpeech } from './wyoming-tts';
export type { WyomingTextToSpeechOptions } from './wyoming-tts';

export { WyomingConnection, WyomingDecoder, encodeEvent, WYOMING_VERSION } from './wyoming-client';
export type { WyomingEvent } from './wyoming-client';

export { PiperTextToSpeech } from './piper-tts';
export type { PiperTextToSpeechOptions } from './piper-tts';
