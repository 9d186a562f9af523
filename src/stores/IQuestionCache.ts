/**
 * Keyed cache for question selection.
 * Async so that a shared store can stand in for the in-process one.
 */

import type { Question } from '../types/models.js';

export interface IQuestionCache {
  /** The cached question, or null when absent or expired. */
  get(key: string): Promise<Question | null>;

  put(key: string, question: Question, ttlMs: number): Promise<void>;

  delete(key: string): Promise<void>;
}

/** Cache key of a user's question for one UTC day. */
export function dailyQuestionKey(userId: string, day: string): string {
  return `daily:${userId}:${day}`;
}
