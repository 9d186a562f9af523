/**
 * In-process TTL cache. An expired entry is evicted when read, and every
 * put sweeps all expired entries.
 */

import type { Question } from '../types/models.js';
import type { IQuestionCache } from './IQuestionCache.js';

interface Entry {
  question: Question;
  expiresAt: number;
}

export class InMemoryQuestionCache implements IQuestionCache {
  private readonly entries = new Map<string, Entry>();

  constructor(private readonly now: () => number = Date.now) {}

  async get(key: string): Promise<Question | null> {
    const entry = this.entries.get(key);
    if (!entry) return null;
    if (entry.expiresAt <= this.now()) {
      this.entries.delete(key);
      return null;
    }
    return structuredClone(entry.question);
  }

  async put(key: string, question: Question, ttlMs: number): Promise<void> {
    const now = this.now();
    for (const [existing, entry] of this.entries) {
      if (entry.expiresAt <= now) this.entries.delete(existing);
    }
    this.entries.set(key, { question: structuredClone(question), expiresAt: now + ttlMs });
  }

  async delete(key: string): Promise<void> {
    this.entries.delete(key);
  }

  get size(): number {
    return this.entries.size;
  }
}
