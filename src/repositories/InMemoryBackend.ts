/**
 * In-memory transaction backend.
 * Single-process stand-in for the Postgres backend, with the same
 * commit contract: version checks and unique keys are verified for the
 * whole changeset before any row is applied.
 * Useful for tests and local development.
 */

import { WriteConflictError } from '../errors.js';
import type {
  AchievementGrant,
  Answer,
  Interaction,
  Partnership,
  Question,
  User,
} from '../types/models.js';
import type { Changeset, ITransactionBackend, RowReader } from './ITransactionBackend.js';

interface Versioned {
  id: string;
  version: number;
}

function clone<T>(value: T): T {
  return structuredClone(value);
}

function byNewest<T extends { createdAt: Date }>(a: T, b: T): number {
  return b.createdAt.getTime() - a.createdAt.getTime();
}

export class InMemoryBackend implements ITransactionBackend {
  readonly users = new Map<string, User>();
  readonly partnerships = new Map<string, Partnership>();
  readonly interactions: Interaction[] = [];
  readonly grants: AchievementGrant[] = [];
  readonly questions = new Map<string, Question>();
  readonly answers = new Map<string, Answer>();

  /** Number of commits applied. */
  commits = 0;

  reader(_signal: AbortSignal): RowReader {
    return {
      userById: async (id) => this.get(this.users, id),
      partnershipById: async (id) => this.get(this.partnerships, id),
      partnershipByPair: async (userId, partnerId) => this.pair(userId, partnerId),
      partnershipsByUser: async (userId) =>
        [...this.partnerships.values()].filter((p) => p.userId === userId).map(clone),
      allPartnerships: async () => [...this.partnerships.values()].map(clone),
      interactionsByPartnerships: async (ids, since) =>
        this.interactions
          .filter((i) => ids.includes(i.partnershipId) && (since === null || i.createdAt >= since))
          .map(clone)
          .sort(byNewest),
      grantExists: async (userId, type) =>
        this.grants.some((g) => g.userId === userId && g.achievementType === type),
      grantsByUser: async (userId) => this.grants.filter((g) => g.userId === userId).map(clone),
      questionById: async (id) => this.get(this.questions, id),
      activeQuestions: async () => [...this.questions.values()].filter((q) => q.active).map(clone),
      answerById: async (id) => this.get(this.answers, id),
      answersByUser: async (userId) =>
        [...this.answers.values()].filter((a) => a.userId === userId).map(clone).sort(byNewest),
      answersByPartnerships: async (ids) =>
        [...this.answers.values()]
          .filter((a) => a.partnershipId !== null && ids.includes(a.partnershipId))
          .map(clone)
          .sort(byNewest),
    };
  }

  async commit(changeset: Changeset): Promise<void> {
    this.checkVersions('users', this.users, changeset.updatedUsers);
    this.checkVersions('partnerships', this.partnerships, changeset.updatedPartnerships);
    this.checkVersions('questions', this.questions, changeset.updatedQuestions);
    this.checkVersions('answers', this.answers, changeset.updatedAnswers);
    this.checkPairs(changeset.insertedPartnerships);
    this.checkGrants(changeset.insertedGrants);

    this.apply(this.users, changeset.updatedUsers);
    this.apply(this.partnerships, changeset.updatedPartnerships);
    this.apply(this.questions, changeset.updatedQuestions);
    this.apply(this.answers, changeset.updatedAnswers);
    for (const row of changeset.insertedPartnerships) this.partnerships.set(row.id, clone(row));
    for (const row of changeset.insertedAnswers) this.answers.set(row.id, clone(row));
    this.interactions.push(...changeset.insertedInteractions.map(clone));
    this.grants.push(...changeset.insertedGrants.map(clone));
    this.commits += 1;
  }

  // ── Seeding ──

  putUser(user: User): void {
    this.users.set(user.id, clone(user));
  }

  putQuestion(question: Question): void {
    this.questions.set(question.id, clone(question));
  }

  putPartnership(partnership: Partnership): void {
    this.partnerships.set(partnership.id, clone(partnership));
  }

  /** Committed row for (userId → partnerId), outside any transaction. */
  pair(userId: string, partnerId: string): Partnership | null {
    const row = [...this.partnerships.values()].find(
      (p) => p.userId === userId && p.partnerId === partnerId
    );
    return row ? clone(row) : null;
  }

  /** Remove a row outside any transaction. */
  deletePartnership(id: string): void {
    this.partnerships.delete(id);
  }

  // ── Private ──

  private get<T>(map: ReadonlyMap<string, T>, id: string): T | null {
    const row = map.get(id);
    return row ? clone(row) : null;
  }

  private checkVersions<T extends Versioned>(
    table: string,
    stored: ReadonlyMap<string, T>,
    updates: readonly T[]
  ): void {
    for (const row of updates) {
      const current = stored.get(row.id);
      if (!current) {
        throw new WriteConflictError(`${table}/${row.id} no longer exists`);
      }
      if (current.version !== row.version) {
        throw new WriteConflictError(
          `${table}/${row.id} is at version ${current.version}, expected ${row.version}`
        );
      }
    }
  }

  private checkPairs(inserts: readonly Partnership[]): void {
    const taken = new Set([...this.partnerships.values()].map((p) => `${p.userId}:${p.partnerId}`));
    for (const row of inserts) {
      const key = `${row.userId}:${row.partnerId}`;
      if (taken.has(key)) {
        throw new WriteConflictError(`partnerships (${key}) already exists`);
      }
      taken.add(key);
    }
  }

  private checkGrants(inserts: readonly AchievementGrant[]): void {
    const taken = new Set(this.grants.map((g) => `${g.userId}:${g.achievementType}`));
    for (const row of inserts) {
      const key = `${row.userId}:${row.achievementType}`;
      if (taken.has(key)) {
        throw new WriteConflictError(`user_achievements (${key}) already exists`);
      }
      taken.add(key);
    }
  }

  private apply<T extends Versioned>(stored: Map<string, T>, updates: readonly T[]): void {
    for (const row of updates) {
      stored.set(row.id, { ...clone(row), version: row.version + 1 });
    }
  }
}
