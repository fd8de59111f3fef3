/**
 * Channel — pull-based async queue with an optional capacity.
 *
 * Producers push synchronously (device callbacks, socket handlers); one
 * consumer pulls with a timeout. When full, the oldest item is dropped so a
 * slow reader always sees the freshest data.
 */

export interface ChannelOptions {
  /** Max buffered items before the oldest is dropped (default: unbounded) */
  capacity?: number;
}

interface Waiter<T> {
  resolve: (item: T | null) => void;
  timer: ReturnType<typeof setTimeout> | null;
}

export class Channel<T> {
  private readonly capacity: number;
  private items: T[] = [];
  private waiter: Waiter<T> | null = null;
  private _closed = false;
  private _dropped = 0;

  constructor(options: ChannelOptions = {}) {
    this.capacity = options.capacity ?? Number.POSITIVE_INFINITY;
    if (!(this.capacity > 0)) {
      throw new RangeError('Channel capacity must be positive');
    }
  }

  get closed(): boolean {
    return this._closed;
  }

  get size(): number {
    return this.items.length;
  }

  /** Items discarded because the buffer was full. */
  get dropped(): number {
    return this._dropped;
  }

  /** Returns false if the channel is closed and the item was discarded. */
  push(item: T): boolean {
    if (this._closed) return false;

    if (this.waiter) {
      const { resolve, timer } = this.waiter;
      this.waiter = null;
      if (timer) clearTimeout(timer);
      resolve(item);
      return true;
    }

    this.items.push(item);
    if (this.items.length > this.capacity) {
      this.items.shift();
      this._dropped++;
    }
    return true;
  }

  /**
   * Take the next item. Resolves null when `timeoutMs` elapses first, or
   * once the channel is closed and drained. Without a timeout it waits
   * until an item arrives or the channel closes.
   */
  next(timeoutMs?: number): Promise<T | null> {
    if (this.waiter) {
      return Promise.reject(new Error('Channel already has a pending reader'));
    }

    if (this.items.length > 0) {
      return Promise.resolve(this.items.shift() ?? null);
    }

    if (this._closed) return Promise.resolve(null);

    return new Promise<T | null>((resolve) => {
      const waiter: Waiter<T> = { resolve, timer: null };
      if (timeoutMs !== undefined) {
        waiter.timer = setTimeout(() => {
          if (this.waiter === waiter) this.waiter = null;
          resolve(null);
        }, Math.max(0, timeoutMs));
      }
      this.waiter = waiter;
    });
  }

  /** Close the channel; a pending reader resolves null, buffered items stay readable. */
  close(): void {
    if (this._closed) return;
    this._closed = true;

    if (this.waiter) {
      const { resolve, timer } = this.waiter;
      this.waiter = null;
      if (timer) clearTimeout(timer);
      resolve(null);
    }
  }
}
