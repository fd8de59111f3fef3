/**
 * WyomingTextToSpeech — synthesis through a Wyoming TTS service (e.g.
 * wyoming-piper on port 10200), played locally through an AudioPlayer.
 *
 * Flow: send `synthesize`, collect `audio-chunk` payloads until
 * `audio-stop`, then play the joined audio.
 */

import type { AudioPlayer, TextToSpeech } from '../core/types';
import { SpeechSynthesisError, errorMessage } from '../core/errors';
import { concatPcm16, bytesToPcm16, downmixPcm16 } from '../audio/pcm';
import { stringField, type JsonRecord } from '../utils/json';
import { createLogger } from '../utils/logger';
import { WyomingConnection } from './wyoming-client';

const log = createLogger('WyomingTTS');

export interface WyomingTextToSpeechOptions {
  player: AudioPlayer;
  host?: string;
  /** Default: 10200 */
  port?: number;
  /** Voice name sent with each request */
  speaker?: string;
  /** Rate assumed when chunks carry none (default: 22050) */
  sampleRate?: number;
  /** Connect and per-event timeout (default: 30000ms) */
  timeoutMs?: number;
}

function intField(data: JsonRecord, key: string, fallback: number): number {
  const value = data[key];
  return typeof value === 'number' && Number.isInteger(value) && value > 0 ? value : fallback;
}

export class WyomingTextToSpeech implements TextToSpeech {
  private readonly player: AudioPlayer;
  private readonly host: string;
  private readonly port: number;
  private readonly speaker: string | undefined;
  private readonly sampleRate: number;
  private readonly timeoutMs: number;

  /** Bumped by stop(); a request from an older generation is dropped. */
  private generation = 0;
  private connection: WyomingConnection | null = null;

  constructor(options: WyomingTextToSpeechOptions) {
    this.player = options.player;
    this.host = options.host ?? 'localhost';
    this.port = options.port ?? 10200;
    this.speaker = options.speaker;
    this.sampleRate = options.sampleRate ?? 22050;
    this.timeoutMs = options.timeoutMs ?? 30_000;
  }

  async speak(text: string): Promise<void> {
    if (!text.trim()) return;
    const generation = this.generation;

    let connection: WyomingConnection;
    try {
      connection = await WyomingConnection.connect(this.host, this.port, this.timeoutMs);
    } catch (err) {
      throw new SpeechSynthesisError(`Speech service could not be reached: ${errorMessage(err)}`, { cause: err });
    }
    if (generation !== this.generation) {
      connection.close();
      return;
    }

    this.connection = connection;
    const chunks: Int16Array[] = [];
    let sampleRate = this.sampleRate;
    try {
      const data: JsonRecord = { text };
      if (this.speaker) data.voice = { name: this.speaker };
      connection.write('synthesize', data);

      while (true) {
        const event = await connection.nextEvent(this.timeoutMs);
        if (generation !== this.generation) return;
        if (!event || event.type === 'audio-stop') break;

        if (event.type === 'error') {
          throw new SpeechSynthesisError(`Speech service error: ${stringField(event.data, 'text') ?? 'unknown'}`);
        }
        if (event.type === 'audio-chunk' && event.payload) {
          const width = intField(event.data, 'width', 2);
          if (width !== 2) {
            throw new SpeechSynthesisError(`Unsupported sample width ${width}`);
          }
          sampleRate = intField(event.data, 'rate', sampleRate);
          chunks.push(downmixPcm16(bytesToPcm16(event.payload), intField(event.data, 'channels', 1)));
        }
      }
    } catch (err) {
      if (generation !== this.generation) return;
      if (err instanceof SpeechSynthesisError) throw err;
      throw new SpeechSynthesisError(`Speech synthesis failed: ${errorMessage(err)}`, { cause: err });
    } finally {
      connection.close();
      if (this.connection === connection) this.connection = null;
    }

    const pcm = concatPcm16(chunks);
    if (pcm.length === 0) {
      throw new SpeechSynthesisError('Speech service produced no audio');
    }

    log.debug(`Playing ${(pcm.length / sampleRate).toFixed(2)}s of speech`);
    await this.player.play(pcm, sampleRate);
  }

  stop(): void {
    this.generation++;
    this.connection?.close();
    this.player.stop();
  }
}
