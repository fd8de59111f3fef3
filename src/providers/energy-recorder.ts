/**
 * EnergyRecorder — amplitude-endpointed utterance capture.
 *
 * Reads frames from an AudioInputDevice. Capture begins at the first frame
 * above the threshold and ends once `silenceSeconds` of quiet audio follow
 * it, or after `maxSeconds` in total. Durations are counted in samples, so
 * the result does not depend on how fast frames are delivered.
 */

import type { AudioFrameSource, AudioInputDevice, AudioRecorder, CapturedUtterance } from '../core/types';
import { RecordingError, errorMessage } from '../core/errors';
import { concatPcm16, float32ToPcm16, meanAbsoluteAmplitude } from '../audio/pcm';
import { createLogger } from '../utils/logger';

const log = createLogger('EnergyRecorder');

export interface EnergyRecorderOptions {
  input: AudioInputDevice;
  /** Rate of the frames the input delivers (default: 16000) */
  sampleRate?: number;
  /** Mean absolute amplitude that counts as speech (default: 0.01) */
  threshold?: number;
  /** Trailing quiet that ends the utterance (default: 1.2s) */
  silenceSeconds?: number;
  /** Hard cap on one recording (default: 30s) */
  maxSeconds?: number;
  /** Upper bound on a single frame wait (default: 100ms) */
  pollIntervalMs?: number;
}

export class EnergyRecorder implements AudioRecorder {
  private readonly input: AudioInputDevice;
  private readonly sampleRate: number;
  private readonly threshold: number;
  private readonly silenceSeconds: number;
  private readonly maxSeconds: number;
  private readonly pollIntervalMs: number;

  constructor(options: EnergyRecorderOptions) {
    this.input = options.input;
    this.sampleRate = options.sampleRate ?? 16000;
    this.threshold = options.threshold ?? 0.01;
    this.silenceSeconds = options.silenceSeconds ?? 1.2;
    this.maxSeconds = options.maxSeconds ?? 30;
    this.pollIntervalMs = options.pollIntervalMs ?? 100;
  }

  async record(): Promise<CapturedUtterance> {
    let source: AudioFrameSource;
    try {
      source = this.input.open();
    } catch (err) {
      throw new RecordingError(`Could not open audio input: ${errorMessage(err)}`, { cause: err });
    }

    log.info(`Listening... (max ${this.maxSeconds}s, stops after ${this.silenceSeconds}s silence)`);

    try {
      const chunks = await this.capture(source);
      const pcm = concatPcm16(chunks);
      if (pcm.length === 0) {
        log.info('No speech recorded');
      } else {
        log.info(`Recorded ${(pcm.length / this.sampleRate).toFixed(2)}s of audio`);
      }
      return { pcm, sampleRate: this.sampleRate };
    } finally {
      source.close();
    }
  }

  private async capture(source: AudioFrameSource): Promise<Int16Array[]> {
    const maxSamples = Math.round(this.maxSeconds * this.sampleRate);
    const silenceSamples = Math.round(this.silenceSeconds * this.sampleRate);
    const deadline = Date.now() + this.maxSeconds * 1000;

    const chunks: Int16Array[] = [];
    let seen = 0;
    let started = false;
    let quiet = 0;
    let capped = true;

    while (seen < maxSamples && Date.now() < deadline) {
      const frame = await source.nextFrame(this.pollIntervalMs);
      if (!frame) {
        if (source.closed) {
          log.warn('Audio input ended during recording');
          capped = false;
          break;
        }
        continue;
      }
      seen += frame.length;

      if (meanAbsoluteAmplitude(frame) > this.threshold) {
        started = true;
        quiet = 0;
        chunks.push(float32ToPcm16(frame));
      } else if (started) {
        chunks.push(float32ToPcm16(frame));
        quiet += frame.length;
        if (quiet >= silenceSamples) {
          capped = false;
          break;
        }
      }
    }

    if (capped) {
      log.info(`Max duration reached (${this.maxSeconds}s)`);
    }
    return chunks;
  }
}
