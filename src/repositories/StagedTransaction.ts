/**
 * Transaction scope that stages writes in memory on top of a RowReader.
 * Reads see committed rows overlaid with this run's own writes; nothing
 * reaches the backend until the unit of work commits the changeset.
 */

import { randomUUID } from 'node:crypto';
import type {
  AchievementGrant,
  Answer,
  Interaction,
  Partnership,
  PartnershipStatus,
  Question,
  User,
} from '../types/models.js';
import type { Changeset, RowReader } from './ITransactionBackend.js';
import type {
  IAchievementRepository,
  IAnswerRepository,
  IInteractionRepository,
  IPartnershipRepository,
  IQuestionRepository,
  IUserRepository,
  NewAchievementGrant,
  NewAnswer,
  NewInteraction,
  NewPartnership,
  TransactionScope,
} from './ITransaction.js';

type Clock = () => Date;

interface Identified {
  id: string;
}

function byNewest<T extends { createdAt: Date }>(a: T, b: T): number {
  return b.createdAt.getTime() - a.createdAt.getTime();
}

/** Replace committed rows with staged versions and append matching staged inserts. */
function overlay<T extends Identified>(
  committed: T[],
  updated: ReadonlyMap<string, T>,
  inserted: Iterable<T>,
  matches: (row: T) => boolean
): T[] {
  const rows = committed.map((row) => updated.get(row.id) ?? row);
  for (const row of inserted) rows.push(row);
  return rows.filter(matches).map((row) => structuredClone(row));
}

export class StagedTransaction implements TransactionScope {
  private readonly insertedPartnerships = new Map<string, Partnership>();
  private readonly updatedPartnerships = new Map<string, Partnership>();
  private readonly updatedUsers = new Map<string, User>();
  private readonly insertedInteractions: Interaction[] = [];
  private readonly insertedGrants: AchievementGrant[] = [];
  private readonly updatedQuestions = new Map<string, Question>();
  private readonly insertedAnswers = new Map<string, Answer>();
  private readonly updatedAnswers = new Map<string, Answer>();

  readonly users: IUserRepository;
  readonly partnerships: IPartnershipRepository;
  readonly interactions: IInteractionRepository;
  readonly achievements: IAchievementRepository;
  readonly questions: IQuestionRepository;
  readonly answers: IAnswerRepository;

  constructor(
    private readonly reader: RowReader,
    private readonly clock: Clock
  ) {
    this.users = {
      findById: (id) => this.findUser(id),
      update: async (user) => this.stage(this.updatedUsers, user),
    };

    this.partnerships = {
      findById: (id) => this.findPartnership(id),
      findByPair: (userId, partnerId) => this.findPartnershipByPair(userId, partnerId),
      findByUser: (userId, status) => this.findPartnershipsByUser(userId, status),
      findAll: async () =>
        overlay(
          await this.reader.allPartnerships(),
          this.updatedPartnerships,
          this.insertedPartnerships.values(),
          () => true
        ),
      insert: async (input) => this.insertPartnership(input),
      update: async (partnership) => this.updatePartnership(partnership),
    };

    this.interactions = {
      insert: async (input) => this.insertInteraction(input),
      findByPartnerships: (ids, since) => this.findInteractions(ids, since),
    };

    this.achievements = {
      exists: async (userId, type) =>
        this.insertedGrants.some((g) => g.userId === userId && g.achievementType === type) ||
        this.reader.grantExists(userId, type),
      insert: async (input) => this.insertGrant(input),
      findByUser: async (userId) => [
        ...(await this.reader.grantsByUser(userId)),
        ...this.insertedGrants.filter((g) => g.userId === userId).map((g) => structuredClone(g)),
      ],
    };

    this.questions = {
      findById: async (id) => {
        const staged = this.updatedQuestions.get(id);
        return staged ? structuredClone(staged) : this.reader.questionById(id);
      },
      findActive: async () =>
        overlay(await this.reader.activeQuestions(), this.updatedQuestions, [], (q) => q.active),
      update: async (question) => this.stage(this.updatedQuestions, question),
    };

    this.answers = {
      findById: (id) => this.findAnswer(id),
      findByUser: async (userId) =>
        overlay(
          await this.reader.answersByUser(userId),
          this.updatedAnswers,
          this.insertedAnswers.values(),
          (a) => a.userId === userId
        ).sort(byNewest),
      findByPartnerships: async (ids) =>
        overlay(
          await this.reader.answersByPartnerships(ids),
          this.updatedAnswers,
          this.insertedAnswers.values(),
          (a) => a.partnershipId !== null && ids.includes(a.partnershipId)
        ).sort(byNewest),
      insert: async (input) => this.insertAnswer(input),
      update: async (answer) => this.updateAnswer(answer),
    };
  }

  changeset(): Changeset {
    return {
      insertedPartnerships: [...this.insertedPartnerships.values()],
      updatedPartnerships: [...this.updatedPartnerships.values()],
      updatedUsers: [...this.updatedUsers.values()],
      insertedInteractions: [...this.insertedInteractions],
      insertedGrants: [...this.insertedGrants],
      updatedQuestions: [...this.updatedQuestions.values()],
      insertedAnswers: [...this.insertedAnswers.values()],
      updatedAnswers: [...this.updatedAnswers.values()],
    };
  }

  // ── Users ──

  private async findUser(id: string): Promise<User | null> {
    const staged = this.updatedUsers.get(id);
    return staged ? structuredClone(staged) : this.reader.userById(id);
  }

  // ── Partnerships ──

  private async findPartnership(id: string): Promise<Partnership | null> {
    const staged = this.insertedPartnerships.get(id) ?? this.updatedPartnerships.get(id);
    return staged ? structuredClone(staged) : this.reader.partnershipById(id);
  }

  private async findPartnershipByPair(userId: string, partnerId: string): Promise<Partnership | null> {
    for (const row of this.insertedPartnerships.values()) {
      if (row.userId === userId && row.partnerId === partnerId) return structuredClone(row);
    }
    const committed = await this.reader.partnershipByPair(userId, partnerId);
    if (!committed) return null;
    const staged = this.updatedPartnerships.get(committed.id);
    return staged ? structuredClone(staged) : committed;
  }

  private async findPartnershipsByUser(
    userId: string,
    status?: PartnershipStatus
  ): Promise<Partnership[]> {
    return overlay(
      await this.reader.partnershipsByUser(userId),
      this.updatedPartnerships,
      this.insertedPartnerships.values(),
      (p) => p.userId === userId && (status === undefined || p.status === status)
    );
  }

  private insertPartnership(input: NewPartnership): Partnership {
    const now = this.clock();
    const row: Partnership = {
      ...structuredClone(input),
      id: randomUUID(),
      version: 1,
      createdAt: now,
      updatedAt: now,
    };
    this.insertedPartnerships.set(row.id, row);
    return structuredClone(row);
  }

  private updatePartnership(partnership: Partnership): Partnership {
    const row = { ...structuredClone(partnership), updatedAt: this.clock() };
    if (this.insertedPartnerships.has(row.id)) {
      this.insertedPartnerships.set(row.id, row);
    } else {
      this.updatedPartnerships.set(row.id, row);
    }
    return structuredClone(row);
  }

  // ── Interactions ──

  private insertInteraction(input: NewInteraction): Interaction {
    const row: Interaction = { ...structuredClone(input), id: randomUUID(), createdAt: this.clock() };
    this.insertedInteractions.push(row);
    return structuredClone(row);
  }

  private async findInteractions(ids: readonly string[], since?: Date): Promise<Interaction[]> {
    const committed = await this.reader.interactionsByPartnerships(ids, since ?? null);
    const staged = this.insertedInteractions.filter(
      (i) => ids.includes(i.partnershipId) && (since === undefined || i.createdAt >= since)
    );
    return [...committed, ...staged.map((i) => structuredClone(i))].sort(byNewest);
  }

  // ── Achievements ──

  private insertGrant(input: NewAchievementGrant): AchievementGrant {
    const row: AchievementGrant = { ...input, id: randomUUID() };
    this.insertedGrants.push(row);
    return { ...row };
  }

  // ── Answers ──

  private async findAnswer(id: string): Promise<Answer | null> {
    const staged = this.insertedAnswers.get(id) ?? this.updatedAnswers.get(id);
    return staged ? structuredClone(staged) : this.reader.answerById(id);
  }

  private insertAnswer(input: NewAnswer): Answer {
    const row: Answer = {
      ...structuredClone(input),
      id: randomUUID(),
      version: 1,
      createdAt: this.clock(),
    };
    this.insertedAnswers.set(row.id, row);
    return structuredClone(row);
  }

  private updateAnswer(answer: Answer): Answer {
    const row = structuredClone(answer);
    if (this.insertedAnswers.has(row.id)) {
      this.insertedAnswers.set(row.id, row);
    } else {
      this.updatedAnswers.set(row.id, row);
    }
    return structuredClone(row);
  }

  // ── Helpers ──

  private stage<T extends Identified>(map: Map<string, T>, row: T): T {
    const copy = structuredClone(row);
    map.set(copy.id, copy);
    return structuredClone(copy);
  }
}
