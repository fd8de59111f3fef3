import { randomUUID } from 'crypto';
import { createLogger } from '../utils/logger';

const log = createLogger('Session');

/**
 * Conversation identifier shared by every backend call of one wake cycle.
 * The backend may hand out a replacement id, which then sticks.
 */
export class ConversationSession {
  private _id: string;

  constructor(id?: string) {
    this._id = id || `session-${randomUUID()}`;
  }

  get id(): string {
    return this._id;
  }

  /** Switch to an id issued by the backend. Returns true if the id changed. */
  adopt(id: string | undefined): boolean {
    if (!id || id === this._id) return false;
    log.info(`Backend switched conversation id: ${this._id} -> ${id}`);
    this._id = id;
    return true;
  }
}
