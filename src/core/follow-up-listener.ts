import type { AudioFrameSource, AudioInputDevice } from './types';
import { DEFAULT_SPEECH_THRESHOLD, meanAbsoluteAmplitude } from '../audio/pcm';
import { createLogger } from '../utils/logger';

const log = createLogger('FollowUpListener');

export interface FollowUpListenerOptions {
  /** Mean absolute amplitude that counts as speech (default: 0.02) */
  threshold?: number;
  /** Upper bound on a single frame wait (default: 50ms) */
  pollIntervalMs?: number;
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, Math.max(0, ms)));
}

/**
 * Decides whether the user kept talking after a turn. Resolves true on the
 * first loud frame, false once the deadline passes. Without a usable input
 * it still waits the full deadline, so callers never spin.
 */
export class FollowUpListener {
  private readonly input: AudioInputDevice | undefined;
  private readonly threshold: number;
  private readonly pollIntervalMs: number;

  constructor(input: AudioInputDevice | undefined, options: FollowUpListenerOptions = {}) {
    this.input = input;
    this.threshold = options.threshold ?? DEFAULT_SPEECH_THRESHOLD;
    this.pollIntervalMs = options.pollIntervalMs ?? 50;
  }

  async listen(timeoutMs: number): Promise<boolean> {
    const deadline = Date.now() + timeoutMs;

    if (!this.input) {
      log.debug(`No audio input — waiting out the ${timeoutMs}ms follow-up window`);
      await sleep(timeoutMs);
      return false;
    }

    let source: AudioFrameSource;
    try {
      source = this.input.open();
    } catch (err) {
      log.warn('Could not open audio input for follow-up detection:', err);
      await sleep(deadline - Date.now());
      return false;
    }

    try {
      return await this.waitForSpeech(source, deadline);
    } catch (err) {
      log.warn('Audio input failed during follow-up detection:', err);
      await sleep(deadline - Date.now());
      return false;
    } finally {
      source.close();
    }
  }

  private async waitForSpeech(source: AudioFrameSource, deadline: number): Promise<boolean> {
    while (true) {
      const remaining = deadline - Date.now();
      if (remaining <= 0) return false;

      const frame = await source.nextFrame(Math.min(remaining, this.pollIntervalMs));
      if (frame) {
        const level = meanAbsoluteAmplitude(frame);
        if (level > this.threshold) {
          log.info(`Follow-up speech detected (level=${level.toFixed(3)})`);
          return true;
        }
      } else if (source.closed) {
        log.warn('Audio input ended during follow-up window');
        await sleep(deadline - Date.now());
        return false;
      }
    }
  }
}
