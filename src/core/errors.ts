/**
 * Failure reported by an external collaborator (recorder, STT, chat backend,
 * TTS). InteractionCycle turns these into an aborted turn; anything else
 * escaping a cycle is treated as a bug.
 */
export class CollaboratorError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'CollaboratorError';
  }
}

/** The chat backend failed: transport error, bad status, or an unusable payload. */
export class ChatClientError extends CollaboratorError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ChatClientError';
  }
}

/** Speech-to-text failed outright (as opposed to returning empty text). */
export class TranscriptionError extends CollaboratorError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'TranscriptionError';
  }
}

export class RecordingError extends CollaboratorError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'RecordingError';
  }
}

export class SpeechSynthesisError extends CollaboratorError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'SpeechSynthesisError';
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export function isAbortError(err: unknown): boolean {
  return err instanceof Error && err.name === 'AbortError';
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}
