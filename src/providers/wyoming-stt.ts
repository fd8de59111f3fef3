/**
 * WyomingSpeechToText — transcription through a Wyoming ASR service
 * (e.g. wyoming-faster-whisper on port 10300).
 *
 * Flow: transcribe → audio-start → audio-chunk* → audio-stop, then wait
 * for a `transcript` event.
 */

import type { CapturedUtterance, SpeechToText } from '../core/types';
import { TranscriptionError, errorMessage } from '../core/errors';
import { stringField } from '../utils/json';
import { createLogger } from '../utils/logger';
import { WyomingConnection } from './wyoming-client';

const log = createLogger('WyomingSTT');

/** Bytes of PCM per audio-chunk event */
const CHUNK_BYTES = 8192;

export interface WyomingSpeechToTextOptions {
  host?: string;
  /** Default: 10300 */
  port?: number;
  /** Connect and per-event timeout (default: 30000ms) */
  timeoutMs?: number;
}

export class WyomingSpeechToText implements SpeechToText {
  private readonly host: string;
  private readonly port: number;
  private readonly timeoutMs: number;

  constructor(options: WyomingSpeechToTextOptions = {}) {
    this.host = options.host ?? 'localhost';
    this.port = options.port ?? 10300;
    this.timeoutMs = options.timeoutMs ?? 30_000;
  }

  async transcribe(utterance: CapturedUtterance, language?: string): Promise<string> {
    if (utterance.pcm.length === 0) {
      log.debug('Empty utterance — nothing to transcribe');
      return '';
    }

    let connection: WyomingConnection;
    try {
      connection = await WyomingConnection.connect(this.host, this.port, this.timeoutMs);
    } catch (err) {
      throw new TranscriptionError(`Speech service could not be reached: ${errorMessage(err)}`, { cause: err });
    }

    const start = performance.now();
    try {
      // Whisper wants the bare language ('en-US' → 'en')
      connection.write('transcribe', { language: (language ?? 'en').split('-')[0] });

      const format = { rate: utterance.sampleRate, width: 2, channels: 1 };
      const { pcm } = utterance;
      const bytes = Buffer.from(pcm.buffer, pcm.byteOffset, pcm.byteLength);
      connection.write('audio-start', format);
      for (let offset = 0; offset < bytes.length; offset += CHUNK_BYTES) {
        connection.write('audio-chunk', format, bytes.subarray(offset, offset + CHUNK_BYTES));
      }
      connection.write('audio-stop');

      while (true) {
        const event = await connection.nextEvent(this.timeoutMs);
        if (!event) {
          throw new TranscriptionError('Speech service closed the connection without a transcript');
        }
        if (event.type === 'transcript') {
          log.debug(`Transcribed in ${(performance.now() - start).toFixed(0)}ms`);
          return (stringField(event.data, 'text') ?? '').trim();
        }
        if (event.type === 'error') {
          throw new TranscriptionError(`Speech service error: ${stringField(event.data, 'text') ?? 'unknown'}`);
        }
      }
    } catch (err) {
      if (err instanceof TranscriptionError) throw err;
      throw new TranscriptionError(`Transcription failed: ${errorMessage(err)}`, { cause: err });
    } finally {
      connection.close();
    }
  }
}
