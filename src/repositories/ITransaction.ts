/**
 * Transaction-scoped data access.
 * Repositories handed to a unit-of-work callback read committed data
 * overlaid with the writes staged so far in the same run. Writes become
 * visible to other runs only when the whole run commits.
 */

import type {
  AchievementGrant,
  Answer,
  Interaction,
  Partnership,
  PartnershipStatus,
  Question,
  User,
} from '../types/models.js';

export type NewPartnership = Omit<Partnership, 'id' | 'version' | 'createdAt' | 'updatedAt'>;
export type NewInteraction = Omit<Interaction, 'id' | 'createdAt'>;
export type NewAnswer = Omit<Answer, 'id' | 'version' | 'createdAt'>;
export type NewAchievementGrant = Omit<AchievementGrant, 'id'>;

export interface IUserRepository {
  findById(id: string): Promise<User | null>;

  /** Stage an update. Fails at commit if the row changed since it was read. */
  update(user: User): Promise<User>;
}

export interface IPartnershipRepository {
  findById(id: string): Promise<Partnership | null>;

  /** The directional row (userId → partnerId), if any. */
  findByPair(userId: string, partnerId: string): Promise<Partnership | null>;

  /** Rows owned by userId, optionally filtered by status. */
  findByUser(userId: string, status?: PartnershipStatus): Promise<Partnership[]>;

  findAll(): Promise<Partnership[]>;

  insert(input: NewPartnership): Promise<Partnership>;

  update(partnership: Partnership): Promise<Partnership>;
}

export interface IInteractionRepository {
  insert(input: NewInteraction): Promise<Interaction>;

  /** Interactions recorded through any of the given rows, most recent first. */
  findByPartnerships(partnershipIds: readonly string[], since?: Date): Promise<Interaction[]>;
}

export interface IAchievementRepository {
  exists(userId: string, achievementType: string): Promise<boolean>;

  insert(input: NewAchievementGrant): Promise<AchievementGrant>;

  findByUser(userId: string): Promise<AchievementGrant[]>;
}

export interface IQuestionRepository {
  findById(id: string): Promise<Question | null>;

  findActive(): Promise<Question[]>;

  update(question: Question): Promise<Question>;
}

export interface IAnswerRepository {
  findById(id: string): Promise<Answer | null>;

  /** Most recent first. */
  findByUser(userId: string): Promise<Answer[]>;

  /** Answers shared through any of the given rows, most recent first. */
  findByPartnerships(partnershipIds: readonly string[]): Promise<Answer[]>;

  insert(input: NewAnswer): Promise<Answer>;

  update(answer: Answer): Promise<Answer>;
}

export interface TransactionScope {
  readonly users: IUserRepository;
  readonly partnerships: IPartnershipRepository;
  readonly interactions: IInteractionRepository;
  readonly achievements: IAchievementRepository;
  readonly questions: IQuestionRepository;
  readonly answers: IAnswerRepository;
}

export interface RunOptions {
  /** Deadline for the work, checked before the commit is sent. */
  timeoutMs?: number;
}

export interface IUnitOfWork {
  /**
   * Execute `work` as one atomic transaction.
   * May invoke `work` more than once when the commit loses a race;
   * `work` must therefore keep its side effects inside the scope.
   */
  run<T>(work: (tx: TransactionScope) => Promise<T>, options?: RunOptions): Promise<T>;
}
