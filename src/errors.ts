/**
 * Application error hierarchy.
 * Every error the engine raises on purpose is an AppError with a stable
 * code and a category the caller can branch on (retry, surface, alert).
 */

export type ErrorCategory =
  | 'validation'
  | 'integrity'
  | 'conflict'
  | 'transient'
  | 'not_found';

export class AppError extends Error {
  constructor(
    public readonly code: string,
    message: string,
    public readonly category: ErrorCategory,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = new.target.name;
  }
}

/** Malformed input. `details.fields` carries field-level messages. */
export class ValidationError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('INVALID_REQUEST', message, 'validation', details);
  }
}

export type AnswerRejection =
  | 'USER_NOT_FOUND'
  | 'INACTIVE_USER'
  | 'QUESTION_NOT_FOUND'
  | 'INACTIVE_QUESTION'
  | 'ALREADY_ANSWERED_TODAY'
  | 'LEVEL_MISMATCH'
  | 'ALREADY_ANSWERED'
  | 'TOO_SOON_TO_REPEAT'
  | 'NO_QUESTIONS_AVAILABLE';

/** A question/answer precondition failed. */
export class AnswerRejectedError extends AppError {
  constructor(
    public readonly reason: AnswerRejection,
    message: string,
    details?: Record<string, unknown>
  ) {
    super(reason, message, 'validation', details);
  }
}

export class NotFoundError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('NOT_FOUND', message, 'not_found', details);
  }
}

export class ConflictError extends AppError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, 'conflict', details);
  }
}

/** Broken data invariant. Never patched silently. */
export class IntegrityError extends AppError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, 'integrity', details);
  }
}

/** Infrastructure failure the caller may retry with backoff. */
export class TransientError extends AppError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, 'transient', details);
  }
}

/**
 * Raised by a transaction backend when a commit loses a race:
 * a row changed since it was read, or a unique key is already taken.
 * Nothing of the rejected changeset has been applied.
 */
export class WriteConflictError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'WriteConflictError';
  }
}

export function isRetryable(err: unknown): boolean {
  return err instanceof AppError && err.category === 'transient';
}
