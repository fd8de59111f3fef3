/**
 * InterruptionMonitor — barge-in detection while the assistant is talking.
 *
 * For the lifetime of one window (a speak call, or a whole streamed reply)
 * a read loop pulls frames from the input device and fires the cycle's
 * CancellationSignal on the first frame louder than the threshold. The loop
 * never touches the output device; stopping playback is left to the
 * `onInterrupt` hook.
 */

import type { AudioFrameSource, AudioInputDevice } from './types';
import type { CancellationSignal } from './cancellation-signal';
import { DEFAULT_SPEECH_THRESHOLD, meanAbsoluteAmplitude } from '../audio/pcm';
import { createLogger } from '../utils/logger';

const log = createLogger('InterruptionMonitor');

export interface InterruptionMonitorOptions {
  /** Mean absolute amplitude that counts as speech (default: 0.02) */
  threshold?: number;
  /** How long a single frame read may wait before re-checking state (default: 50ms) */
  pollIntervalMs?: number;
  /** Called once, right after the signal fires (e.g. stop TTS playback) */
  onInterrupt?: () => void;
}

export interface MonitorHandle {
  /** True if this window's monitor fired the signal. */
  readonly triggered: boolean;
  /** Tear the monitor down and wait for its read loop to exit. Never rejects. */
  stop(): Promise<void>;
}

const IDLE_HANDLE: MonitorHandle = {
  triggered: false,
  stop: async () => {},
};

export class InterruptionMonitor {
  private readonly input: AudioInputDevice | undefined;
  private readonly threshold: number;
  private readonly pollIntervalMs: number;
  private readonly onInterrupt: (() => void) | undefined;

  constructor(input: AudioInputDevice | undefined, options: InterruptionMonitorOptions = {}) {
    this.input = input;
    this.threshold = options.threshold ?? DEFAULT_SPEECH_THRESHOLD;
    this.pollIntervalMs = options.pollIntervalMs ?? 50;
    this.onInterrupt = options.onInterrupt;
  }

  /**
   * Run `task` with the monitor active. The monitor is stopped before this
   * returns or rethrows, whichever way the task ends.
   */
  async watch<T>(signal: CancellationSignal, task: () => Promise<T>): Promise<T> {
    const handle = this.start(signal);
    try {
      return await task();
    } finally {
      await handle.stop();
    }
  }

  /** Open the input and start the read loop. Pair every call with stop(). */
  start(signal: CancellationSignal): MonitorHandle {
    if (!this.input) {
      log.debug('No audio input available — barge-in disabled for this window');
      return IDLE_HANDLE;
    }
    if (signal.fired) return IDLE_HANDLE;

    let source: AudioFrameSource;
    try {
      source = this.input.open();
    } catch (err) {
      log.warn('Could not open audio input — barge-in disabled for this window:', err);
      return IDLE_HANDLE;
    }

    const state = { stopped: false, triggered: false };
    const loop = this.readLoop(source, signal, state);

    let stopping: Promise<void> | null = null;
    return {
      get triggered() {
        return state.triggered;
      },
      stop: () => {
        if (!stopping) {
          state.stopped = true;
          source.close();
          stopping = loop;
        }
        return stopping;
      },
    };
  }

  private async readLoop(
    source: AudioFrameSource,
    signal: CancellationSignal,
    state: { stopped: boolean; triggered: boolean },
  ): Promise<void> {
    try {
      while (!state.stopped && !signal.fired) {
        const frame = await source.nextFrame(this.pollIntervalMs);
        if (!frame) {
          if (source.closed && !state.stopped) {
            log.warn('Audio input ended while monitoring — barge-in disabled for this window');
            break;
          }
          continue;
        }
        if (state.stopped || signal.fired) continue;

        const level = meanAbsoluteAmplitude(frame);
        if (level <= this.threshold) continue;

        if (signal.fire('barge-in')) {
          state.triggered = true;
          log.info(`Interrupted by user speech (level=${level.toFixed(3)})`);
          this.requestStop();
        }
      }
    } catch (err) {
      log.warn('Audio input failed while monitoring — barge-in disabled for this window:', err);
    } finally {
      source.close();
    }
  }

  private requestStop(): void {
    try {
      this.onInterrupt?.();
    } catch (err) {
      log.warn('Playback stop request failed:', err);
    }
  }
}
