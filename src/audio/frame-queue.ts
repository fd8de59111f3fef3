import { Channel } from '../utils/channel';
import type { AudioFrameSource } from '../core/types';

/** Default depth: ~2s of 512-sample frames at 16kHz. */
const DEFAULT_CAPACITY = 64;

/**
 * Bounded frame buffer between an input driver and the code deciding on it.
 * The driver pushes normalized frames; InterruptionMonitor, FollowUpListener
 * and recorders pull them with a timeout.
 */
export class FrameQueue implements AudioFrameSource {
  private readonly channel: Channel<Float32Array>;
  private onClose: (() => void) | null;

  constructor(options: { capacity?: number; onClose?: () => void } = {}) {
    this.channel = new Channel<Float32Array>({ capacity: options.capacity ?? DEFAULT_CAPACITY });
    this.onClose = options.onClose ?? null;
  }

  get closed(): boolean {
    return this.channel.closed;
  }

  get dropped(): number {
    return this.channel.dropped;
  }

  push(frame: Float32Array): boolean {
    return this.channel.push(frame);
  }

  nextFrame(timeoutMs: number): Promise<Float32Array | null> {
    return this.channel.next(timeoutMs);
  }

  close(): void {
    if (this.channel.closed) return;
    this.channel.close();
    const onClose = this.onClose;
    this.onClose = null;
    onClose?.();
  }
}
