/**
 * RemoteSpeechToText — transcription through an HTTP speech service.
 *
 * Protocol:
 * - POST {baseUrl}/transcribe, Content-Type audio/wav, body = PCM16 WAV
 * - Optional `language` query parameter
 * - Reply: JSON {"text": "..."} or plain text
 */

import type { CapturedUtterance, SpeechToText } from '../core/types';
import { TranscriptionError, errorMessage } from '../core/errors';
import { encodeWav } from '../audio/wav';
import { stringField, tryParseJson } from '../utils/json';
import { createLogger } from '../utils/logger';

const log = createLogger('RemoteSTT');

export interface RemoteSpeechToTextOptions {
  /** Base URL of the speech service (e.g. 'http://whisper:9000') */
  baseUrl: string;
  /** Per-request timeout (default: 30000ms) */
  timeoutMs?: number;
}

export class RemoteSpeechToText implements SpeechToText {
  private readonly endpoint: string;
  private readonly timeoutMs: number;

  constructor(options: RemoteSpeechToTextOptions) {
    if (!options.baseUrl) {
      throw new Error('RemoteSpeechToText requires a baseUrl');
    }
    this.endpoint = `${options.baseUrl.replace(/\/+$/, '')}/transcribe`;
    this.timeoutMs = options.timeoutMs ?? 30_000;
  }

  async transcribe(utterance: CapturedUtterance, language?: string): Promise<string> {
    if (utterance.pcm.length === 0) {
      log.debug('Empty utterance — nothing to transcribe');
      return '';
    }

    const url = language ? `${this.endpoint}?language=${encodeURIComponent(language)}` : this.endpoint;
    const wav = encodeWav(utterance.pcm, utterance.sampleRate);
    const start = performance.now();

    let response: Response;
    try {
      response = await fetch(url, {
        method: 'POST',
        headers: { 'Content-Type': 'audio/wav' },
        body: wav,
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (err) {
      throw new TranscriptionError(`Speech service could not be reached: ${errorMessage(err)}`, { cause: err });
    }

    const body = await response.text();
    if (!response.ok) {
      throw new TranscriptionError(`Speech service error ${response.status}: ${body}`);
    }

    let text = body;
    if ((response.headers.get('content-type') ?? '').includes('application/json')) {
      text = stringField(tryParseJson(body), 'text') ?? '';
    }

    log.debug(`Transcribed in ${(performance.now() - start).toFixed(0)}ms`);
    return text.trim();
  }
}
