export type DialogueErrorCode =
  | 'UNRECOGNIZED_INTENT'
  | 'SLOT_VALIDATION_FAILED'
  | 'BACKEND_UNAVAILABLE'
  | 'SESSION_STORE_UNAVAILABLE'
  | 'TOO_MANY_TURNS';

export class DialogueError extends Error {
  constructor(
    message: string,
    public readonly code: DialogueErrorCode,
    public readonly cause?: Error
  ) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Low confidence, no match, or a label the catalog does not know
 */
export class UnrecognizedIntentError extends DialogueError {
  constructor(public readonly intent: string | null, message: string = 'Intent not recognized') {
    super(message, 'UNRECOGNIZED_INTENT');
  }
}

export class SlotValidationFailedError extends DialogueError {
  constructor(public readonly slot: string, message: string) {
    super(message, 'SLOT_VALIDATION_FAILED');
  }
}

export class BackendUnavailableError extends DialogueError {
  constructor(message: string = 'Backend unavailable', cause?: Error) {
    super(message, 'BACKEND_UNAVAILABLE', cause);
  }
}

export class SessionStoreUnavailableError extends DialogueError {
  constructor(message: string = 'Session store unavailable', cause?: Error) {
    super(message, 'SESSION_STORE_UNAVAILABLE', cause);
  }
}

export class TooManyTurnsError extends DialogueError {
  constructor(public readonly turnCount: number) {
    super(`Turn limit exceeded after ${turnCount} turns`, 'TOO_MANY_TURNS');
  }
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
