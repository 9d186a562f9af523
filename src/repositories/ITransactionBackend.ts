/**
 * Storage backend contract for the unit of work.
 * A backend reads committed rows and applies a changeset atomically:
 * every updated row must still carry the version it was read at, and
 * unique keys must hold, otherwise nothing is applied and the commit
 * rejects with WriteConflictError.
 */

import type {
  AchievementGrant,
  Answer,
  Interaction,
  Partnership,
  Question,
  User,
} from '../types/models.js';

export interface RowReader {
  userById(id: string): Promise<User | null>;
  partnershipById(id: string): Promise<Partnership | null>;
  partnershipByPair(userId: string, partnerId: string): Promise<Partnership | null>;
  partnershipsByUser(userId: string): Promise<Partnership[]>;
  allPartnerships(): Promise<Partnership[]>;
  interactionsByPartnerships(partnershipIds: readonly string[], since: Date | null): Promise<Interaction[]>;
  grantExists(userId: string, achievementType: string): Promise<boolean>;
  grantsByUser(userId: string): Promise<AchievementGrant[]>;
  questionById(id: string): Promise<Question | null>;
  activeQuestions(): Promise<Question[]>;
  answerById(id: string): Promise<Answer | null>;
  answersByUser(userId: string): Promise<Answer[]>;
  answersByPartnerships(partnershipIds: readonly string[]): Promise<Answer[]>;
}

/** Writes staged by one run. Updated rows carry the version they were read at. */
export interface Changeset {
  insertedPartnerships: Partnership[];
  updatedPartnerships: Partnership[];
  updatedUsers: User[];
  insertedInteractions: Interaction[];
  insertedGrants: AchievementGrant[];
  updatedQuestions: Question[];
  insertedAnswers: Answer[];
  updatedAnswers: Answer[];
}

export interface ITransactionBackend {
  reader(signal: AbortSignal): RowReader;

  /**
   * Apply all or nothing. Rejects with WriteConflictError on a lost race.
   * Takes no abort signal: once sent, a changeset runs to completion.
   */
  commit(changeset: Changeset): Promise<void>;
}

export function isEmptyChangeset(changeset: Changeset): boolean {
  return Object.values(changeset).every((rows: unknown[]) => rows.length === 0);
}
