/**
 * RemoteTextToSpeech — synthesis through an HTTP speech service, played
 * locally through an AudioPlayer.
 *
 * Protocol:
 * - POST {baseUrl}/synthesize with {"text", "speaker"?}
 * - Reply: a PCM16 WAV file, or headerless PCM16 mono at `sampleRate`
 *
 * stop() aborts an in-flight request as well as playback.
 */

import type { AudioPlayer, TextToSpeech } from '../core/types';
import { SpeechSynthesisError, errorMessage, isAbortError } from '../core/errors';
import { decodeWav } from '../audio/wav';
import { bytesToPcm16 } from '../audio/pcm';
import { createLogger } from '../utils/logger';

const log = createLogger('RemoteTTS');

export interface RemoteTextToSpeechOptions {
  /** Base URL of the speech service (e.g. 'http://piper:5000') */
  baseUrl: string;
  player: AudioPlayer;
  /** Voice name passed through to the service */
  speaker?: string;
  /** Rate assumed for headerless replies (default: 16000) */
  sampleRate?: number;
  /** Per-request timeout (default: 30000ms) */
  timeoutMs?: number;
}

export class RemoteTextToSpeech implements TextToSpeech {
  private readonly endpoint: string;
  private readonly player: AudioPlayer;
  private readonly speaker: string | undefined;
  private readonly sampleRate: number;
  private readonly timeoutMs: number;
  private inflight: AbortController | null = null;

  constructor(options: RemoteTextToSpeechOptions) {
    if (!options.baseUrl) {
      throw new Error('RemoteTextToSpeech requires a baseUrl');
    }
    this.endpoint = `${options.baseUrl.replace(/\/+$/, '')}/synthesize`;
    this.player = options.player;
    this.speaker = options.speaker;
    this.sampleRate = options.sampleRate ?? 16000;
    this.timeoutMs = options.timeoutMs ?? 30_000;
  }

  async speak(text: string): Promise<void> {
    if (!text.trim()) return;

    const controller = new AbortController();
    this.inflight = controller;
    const timer = setTimeout(() => controller.abort(new SpeechSynthesisError('Speech synthesis timed out')), this.timeoutMs);

    let audio: Uint8Array;
    try {
      const body: Record<string, string> = { text };
      if (this.speaker) body.speaker = this.speaker;

      const response = await fetch(this.endpoint, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify(body),
        signal: controller.signal,
      });
      if (!response.ok) {
        throw new SpeechSynthesisError(`Speech service error ${response.status}: ${await response.text()}`);
      }
      audio = new Uint8Array(await response.arrayBuffer());
    } catch (err) {
      // stop() during the request: nothing to play
      if (isAbortError(err) && controller.signal.aborted) return;
      if (err instanceof SpeechSynthesisError) throw err;
      throw new SpeechSynthesisError(`Speech service could not be reached: ${errorMessage(err)}`, { cause: err });
    } finally {
      clearTimeout(timer);
      if (this.inflight === controller) this.inflight = null;
    }

    if (audio.length === 0) {
      throw new SpeechSynthesisError('Speech service produced no audio');
    }

    const isWav = audio.length >= 4 && Buffer.from(audio.subarray(0, 4)).toString('ascii') === 'RIFF';
    const { pcm, sampleRate } = isWav
      ? decodeWav(audio)
      : { pcm: bytesToPcm16(audio), sampleRate: this.sampleRate };

    log.debug(`Playing ${(pcm.length / sampleRate).toFixed(2)}s of speech`);
    await this.player.play(pcm, sampleRate);
  }

  stop(): void {
    this.inflight?.abort();
    this.player.stop();
  }
}
