import { createLogger } from '../utils/logger';

const log = createLogger('Cancellation');

/**
 * One-shot cancellation token for a single interaction cycle.
 *
 * `fire()` is idempotent: only the first call flips the flag, aborts the
 * underlying AbortSignal and runs the listeners. Create a new instance per
 * cycle; a fired signal is never reset, so a stale one cannot leak into a
 * later turn.
 */
export class CancellationSignal {
  private readonly controller = new AbortController();
  private _fired = false;
  private _reason: string | null = null;
  private listeners: Array<() => void> = [];

  get fired(): boolean {
    return this._fired;
  }

  get reason(): string | null {
    return this._reason;
  }

  /** Aborted when the token fires; hand this to fetch/WebSocket consumers. */
  get signal(): AbortSignal {
    return this.controller.signal;
  }

  /**
   * Register a callback for the moment the token fires.
   * Runs immediately if it already has. Returns an unsubscribe function.
   */
  onFire(cb: () => void): () => void {
    if (this._fired) {
      cb();
      return () => {};
    }
    this.listeners.push(cb);
    return () => {
      this.listeners = this.listeners.filter((l) => l !== cb);
    };
  }

  /** Returns true only for the call that performed the false → true transition. */
  fire(reason = 'cancelled'): boolean {
    if (this._fired) return false;
    this._fired = true;
    this._reason = reason;

    log.debug(`Cancellation fired (${reason})`);
    this.controller.abort();

    const listeners = this.listeners;
    this.listeners = [];
    for (const cb of listeners) {
      try {
        cb();
      } catch (err) {
        log.warn('Cancellation listener threw:', err);
      }
    }
    return true;
  }
}
