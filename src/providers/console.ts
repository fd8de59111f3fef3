/**
 * Console collaborators — drive the assistant from a terminal.
 *
 * The wake detector and recorder read typed lines; STT echoes the typed
 * text; TTS prints the reply. Lets the whole turn-taking loop run without
 * audio hardware.
 */

import { createInterface, type Interface } from 'readline';
import type { CapturedUtterance, AudioRecorder, SpeechToText, TextToSpeech, WakeWordDetector } from '../core/types';
import { RecordingError, TranscriptionError } from '../core/errors';
import { Channel } from '../utils/channel';
import { createLogger } from '../utils/logger';

const log = createLogger('Console');

export interface ConsolePromptOptions {
  input?: NodeJS.ReadableStream;
  output?: NodeJS.WritableStream;
}

/** Line reader shared by the console wake detector and recorder. */
export class ConsolePrompt {
  readonly output: NodeJS.WritableStream;
  private readonly rl: Interface;
  private readonly lines = new Channel<string>();

  constructor(options: ConsolePromptOptions = {}) {
    this.output = options.output ?? process.stdout;
    this.rl = createInterface({ input: options.input ?? process.stdin, terminal: false });
    this.rl.on('line', (line) => this.lines.push(line));
    this.rl.on('close', () => this.lines.close());
  }

  get closed(): boolean {
    return this.lines.closed;
  }

  /** Print `prompt` and resolve with the next line, or null once input ends. */
  async ask(prompt: string): Promise<string | null> {
    if (prompt) this.output.write(prompt);
    return this.lines.next();
  }

  write(text: string): void {
    this.output.write(text);
  }

  /** Stop reading; pending and future ask() calls resolve null. */
  close(): void {
    this.rl.close();
    this.lines.close();
  }
}

export interface ConsoleWakeWordDetectorOptions {
  /** Shown in the prompt (default: 'hey wakeline') */
  keyword?: string;
  /** Lines that end the program (default: exit, quit, q) */
  exitWords?: string[];
}

/** Any line wakes the assistant; an exit word or end of input shuts it down. */
export class ConsoleWakeWordDetector implements WakeWordDetector {
  private readonly prompt: ConsolePrompt;
  private readonly keyword: string;
  private readonly exitWords: Set<string>;

  constructor(prompt: ConsolePrompt, options: ConsoleWakeWordDetectorOptions = {}) {
    this.prompt = prompt;
    this.keyword = options.keyword ?? 'hey wakeline';
    this.exitWords = new Set((options.exitWords ?? ['exit', 'quit', 'q']).map((w) => w.toLowerCase()));
  }

  async awaitWake(): Promise<boolean> {
    const line = await this.prompt.ask(`Press ENTER or type "${this.keyword}" to talk ("exit" to quit)\n`);
    if (line === null) {
      log.info('Input closed');
      return false;
    }
    if (this.exitWords.has(line.trim().toLowerCase())) {
      log.info('Exit requested');
      return false;
    }
    return true;
  }
}

/** Captures a typed line in place of audio. */
export class ConsoleRecorder implements AudioRecorder {
  private readonly prompt: ConsolePrompt;

  constructor(prompt: ConsolePrompt) {
    this.prompt = prompt;
  }

  async record(): Promise<CapturedUtterance> {
    const line = await this.prompt.ask('You: ');
    if (line === null) {
      throw new RecordingError('Console input closed');
    }
    return { pcm: new Int16Array(0), sampleRate: 16000, transcriptHint: line.trim() };
  }
}

/** Returns the typed text carried by ConsoleRecorder utterances. */
export class EchoSpeechToText implements SpeechToText {
  async transcribe(utterance: CapturedUtterance): Promise<string> {
    if (utterance.transcriptHint === undefined) {
      throw new TranscriptionError('No transcript hint on utterance; echo STT only works with typed input');
    }
    return utterance.transcriptHint;
  }
}

export class ConsoleTextToSpeech implements TextToSpeech {
  private readonly output: NodeJS.WritableStream;

  constructor(output: NodeJS.WritableStream = process.stdout) {
    this.output = output;
  }

  async speak(text: string): Promise<void> {
    this.output.write(`Assistant: ${text}\n`);
  }

  stop(): void {}
}
