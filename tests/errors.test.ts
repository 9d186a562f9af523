import { describe, it, expect } from 'vitest';
import {
  AnswerRejectedError,
  ConflictError,
  IntegrityError,
  NotFoundError,
  TransientError,
  ValidationError,
  WriteConflictError,
  isRetryable,
} from '../src/errors.js';

describe('errors', () => {
  it('should give each error its code and category', () => {
    expect(new ValidationError('bad', { fields: ['x'] })).toMatchObject({
      code: 'INVALID_REQUEST',
      category: 'validation',
      details: { fields: ['x'] },
      name: 'ValidationError',
    });
    expect(new AnswerRejectedError('LEVEL_MISMATCH', 'no')).toMatchObject({
      code: 'LEVEL_MISMATCH',
      reason: 'LEVEL_MISMATCH',
      category: 'validation',
    });
    expect(new NotFoundError('gone')).toMatchObject({ code: 'NOT_FOUND', category: 'not_found' });
    expect(new ConflictError('DUPLICATE_RELATIONSHIP', 'dup')).toMatchObject({ category: 'conflict' });
    expect(new IntegrityError('REVERSE_RELATIONSHIP_MISSING', 'broken')).toMatchObject({ category: 'integrity' });
  });

  // --- isRetryable() ---

  it('should only mark transient errors as retryable', () => {
    expect(isRetryable(new TransientError('DEADLINE_EXCEEDED', 'slow'))).toBe(true);
    expect(isRetryable(new IntegrityError('REVERSE_RELATIONSHIP_MISSING', 'broken'))).toBe(false);
    expect(isRetryable(new WriteConflictError('users/u1 changed'))).toBe(false);
    expect(isRetryable('nope')).toBe(false);
  });
});
