/**
 * SessionController — the wake → converse → idle loop.
 *
 * Wires together:
 * - WakeWordDetector (starts a session, or asks for shutdown)
 * - InteractionCycle (one listen/transcribe/converse/speak turn)
 * - FollowUpListener (keeps the session open while the user keeps talking)
 *
 * States: waiting_for_wake → in_session ⇄ listening_for_followup, and
 * shutdown once the wake detector declines or an unexpected error escapes.
 */

import { EventEmitter } from 'events';
import type { SessionEvents, SessionState, TurnResult, WakeWordDetector } from './types';
import { InteractionCycle, type InteractionCycleOptions } from './interaction-cycle';
import { FollowUpListener } from './follow-up-listener';
import { ConversationSession } from './session';
import { createLogger } from '../utils/logger';

const log = createLogger('SessionController');

export const DEFAULT_FOLLOW_UP_TIMEOUT_MS = 12_000;

export interface SessionControllerConfig extends InteractionCycleOptions {
  wake: WakeWordDetector;
  /** How long to wait for renewed speech after a turn (default: 12000ms) */
  followUpTimeoutMs?: number;
  /** Speech threshold for the follow-up window (default: interruptionThreshold) */
  followUpThreshold?: number;
  /** Pre-assigned conversation id; otherwise each session gets a fresh one */
  sessionId?: string;
}

export interface SessionController {
  on<E extends keyof SessionEvents>(event: E, listener: SessionEvents[E]): this;
  once<E extends keyof SessionEvents>(event: E, listener: SessionEvents[E]): this;
  off<E extends keyof SessionEvents>(event: E, listener: SessionEvents[E]): this;
  emit<E extends keyof SessionEvents>(event: E, ...args: Parameters<SessionEvents[E]>): boolean;
}

export class SessionController extends EventEmitter {
  private readonly wake: WakeWordDetector;
  private readonly cycle: InteractionCycle;
  private readonly followUp: FollowUpListener;
  /** Length of the follow-up window after each completed turn. */
  readonly followUpTimeoutMs: number;
  private readonly presetSessionId: string | undefined;

  private _state: SessionState = 'waiting_for_wake';
  private _session: ConversationSession | null = null;
  private _running = false;

  constructor(config: SessionControllerConfig) {
    super();
    this.wake = config.wake;
    this.followUpTimeoutMs = config.followUpTimeoutMs ?? DEFAULT_FOLLOW_UP_TIMEOUT_MS;
    this.presetSessionId = config.sessionId;

    this.cycle = new InteractionCycle(config);
    this.followUp = new FollowUpListener(config.input, {
      threshold: config.followUpThreshold ?? config.interruptionThreshold,
      pollIntervalMs: config.monitorPollIntervalMs,
    });

    // Forward cycle events
    this.cycle.on('transcription', (text: string) => this.emit('transcription', text));
    this.cycle.on('sentence', (text: string) => this.emit('sentence', text));
    this.cycle.on('response', (text: string) => this.emit('response', text));
    this.cycle.on('interrupted', () => this.emit('interrupted'));
  }

  get state(): SessionState {
    return this._state;
  }

  get running(): boolean {
    return this._running;
  }

  /** Id of the active conversation, or null between sessions. */
  get sessionId(): string | null {
    return this._session?.id ?? null;
  }

  /**
   * Run until the wake detector asks for shutdown. Rejects, after moving to
   * `shutdown`, if anything other than a collaborator failure escapes a turn.
   */
  async run(): Promise<void> {
    if (this._running) {
      throw new Error('SessionController is already running');
    }
    if (this._state === 'shutdown') {
      throw new Error('SessionController has shut down');
    }
    this._running = true;

    try {
      while (this._state !== 'shutdown') {
        await this.step();
      }
      log.info('Shut down');
    } catch (err) {
      log.error(`Unexpected error in state "${this._state}" (session ${this.sessionId ?? 'none'}):`, err);
      this.endSession();
      this.setState('shutdown');
      throw err;
    } finally {
      this._running = false;
    }
  }

  private async step(): Promise<void> {
    switch (this._state) {
      case 'waiting_for_wake':
        await this.waitForWake();
        break;
      case 'in_session':
        await this.runTurn();
        break;
      case 'listening_for_followup':
        await this.listenForFollowUp();
        break;
      case 'shutdown':
        break;
    }
  }

  private async waitForWake(): Promise<void> {
    log.info('Waiting for wake word...');
    const woke = await this.wake.awaitWake();
    if (!woke) {
      this.setState('shutdown');
      return;
    }

    this._session = new ConversationSession(this.presetSessionId);
    log.info(`Session started: ${this._session.id}`);
    this.emit('session', this._session.id);
    this.setState('in_session');
  }

  private async runTurn(): Promise<void> {
    const session = this.requireSession();
    const result: TurnResult = await this.cycle.run(session);

    if (result.status === 'aborted') {
      log.warn(`Turn aborted (${result.error.name}) — session ${session.id} ended`);
      this.emit('aborted', result.error);
      this.endSession();
      this.setState('waiting_for_wake');
      return;
    }

    if (result.interrupted) {
      log.debug('Interrupted — listening again without waiting for wake');
      // Re-enter in_session directly so the next turn starts at once
      this.setState('in_session');
      return;
    }

    this.setState('listening_for_followup');
  }

  private async listenForFollowUp(): Promise<void> {
    log.debug(`Listening for follow-up (${this.followUpTimeoutMs}ms)...`);
    const heard = await this.followUp.listen(this.followUpTimeoutMs);
    if (heard) {
      this.setState('in_session');
      return;
    }

    log.info('No follow-up — session ended');
    this.endSession();
    this.setState('waiting_for_wake');
  }

  private requireSession(): ConversationSession {
    if (!this._session) {
      throw new Error('No active session in state "in_session"');
    }
    return this._session;
  }

  private endSession(): void {
    this._session = null;
  }

  private setState(state: SessionState): void {
    const previous = this._state;
    this._state = state;
    if (previous !== state) {
      log.debug(`State: ${previous} -> ${state}`);
    }
    this.emit('state', state);
  }
}
