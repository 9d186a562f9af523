/**
 * Partnership service.
 * Owns the pair of mirrored rows that make up one relationship. Every
 * shared field is written to both rows in the same unit of work, so the
 * mirrors never disagree after a commit.
 */

import { daysBetween, toCalendarDay } from '../engine/calendar.js';
import {
  answerBreakdown,
  bumpMonthlyActivity,
  defaultCustomSettings,
  defaultPartnershipStats,
  interactionBreakdown,
  milestoneFor,
  partnershipLevelFor,
  recordUserInteraction,
} from '../engine/stats.js';
import { advanceStreak } from '../engine/streak.js';
import { ConflictError, IntegrityError, NotFoundError } from '../errors.js';
import type { ILogProvider } from '../providers/ILogProvider.js';
import { partnershipTopic, userTopic } from '../providers/INotificationSink.js';
import type { IUnitOfWork, RunOptions, TransactionScope } from '../repositories/ITransaction.js';
import type {
  CreatePartnershipInput,
  ListPartnershipsOptions,
  PartnershipStatsView,
  RecordInteractionInput,
  RecordInteractionResult,
} from '../types/api.js';
import type { CustomSettings, Partnership, PartnershipStatus, Question, User } from '../types/models.js';
import type { AchievementService } from './AchievementService.js';
import { collectPairMetrics } from './MetricsCollector.js';
import type { NotificationDispatcher } from './NotificationDispatcher.js';
import { transact } from './transact.js';
import type { TransactDeps } from './transact.js';
import {
  assertValid,
  checkNickname,
  checkStatus,
  isInteractionType,
  isRecord,
  parseCustomSettings,
} from './validation.js';

export interface PartnershipServiceOptions {
  clock?: () => Date;
  logProvider?: ILogProvider;
}

export interface MirroredPair {
  forward: Partnership;
  reverse: Partnership;
}

/** Load a row and its mirror. A missing mirror is an integrity failure. */
export async function loadPair(tx: TransactionScope, partnershipId: string): Promise<MirroredPair> {
  const forward = await tx.partnerships.findById(partnershipId);
  if (!forward) {
    throw new NotFoundError(`Partnership "${partnershipId}" not found`, { partnershipId });
  }

  const reverse = await tx.partnerships.findByPair(forward.partnerId, forward.userId);
  if (!reverse) {
    throw new IntegrityError(
      'REVERSE_RELATIONSHIP_MISSING',
      `Partnership "${partnershipId}" has no mirror row`,
      { partnershipId, userId: forward.userId, partnerId: forward.partnerId }
    );
  }

  return { forward, reverse };
}

async function requireUser(tx: TransactionScope, userId: string): Promise<User> {
  const user = await tx.users.findById(userId);
  if (!user) throw new NotFoundError(`User "${userId}" not found`, { userId });
  return user;
}

async function reload(tx: TransactionScope, partnershipId: string): Promise<Partnership> {
  const row = await tx.partnerships.findById(partnershipId);
  if (!row) throw new NotFoundError(`Partnership "${partnershipId}" not found`, { partnershipId });
  return row;
}

export class PartnershipService {
  private readonly clock: () => Date;
  private readonly deps: TransactDeps;

  constructor(
    uow: IUnitOfWork,
    private readonly achievements: AchievementService,
    notifier: NotificationDispatcher,
    options: PartnershipServiceOptions = {}
  ) {
    this.clock = options.clock ?? (() => new Date());
    this.deps = { uow, notifier, logProvider: options.logProvider };
  }

  /** Create both mirrored rows for a new relationship and notify the partner. */
  async create(
    userId: string,
    partnerId: string,
    input: CreatePartnershipInput = {},
    options?: RunOptions
  ): Promise<Partnership> {
    if (userId === partnerId) {
      throw new ConflictError('SELF_RELATIONSHIP', 'A user cannot partner with themselves', { userId });
    }

    const errors: string[] = [];
    const status = input.status ?? 'pending';
    checkStatus(status, errors);
    checkNickname(input.nickname, errors);
    const customSettings =
      input.customSettings === undefined
        ? defaultCustomSettings()
        : parseCustomSettings(input.customSettings, errors);
    assertValid(errors);

    return transact(this.deps, 'partnership.create', async (tx, outbox) => {
      await requireUser(tx, userId);
      await requireUser(tx, partnerId);

      const existing =
        (await tx.partnerships.findByPair(userId, partnerId)) ??
        (await tx.partnerships.findByPair(partnerId, userId));
      if (existing) {
        throw new ConflictError(
          'DUPLICATE_RELATIONSHIP',
          'These users already have a partnership',
          { userId, partnerId, partnershipId: existing.id }
        );
      }

      const shared = {
        status,
        partnershipLevel: 1,
        streakDays: 0,
        longestStreak: 0,
        interactionCount: 0,
        lastInteractionDate: null,
        lastMilestone: 0,
        achievements: [],
        mutualAnswerCount: 0,
        customSettings: customSettings ?? defaultCustomSettings(),
        stats: defaultPartnershipStats(),
      };

      const forward = await tx.partnerships.insert({
        ...shared,
        userId,
        partnerId,
        nickname: input.nickname ?? null,
      });
      const reverse = await tx.partnerships.insert({
        ...shared,
        userId: partnerId,
        partnerId: userId,
        nickname: null,
      });

      if (status === 'active') {
        const metrics = await collectPairMetrics(tx, forward, reverse, this.clock());
        await this.achievements.grantToPair(tx, forward, reverse, ['partnership_status'], metrics, outbox);
      }

      outbox.add(userTopic(partnerId), 'partnership_request', {
        partnershipId: reverse.id,
        fromUserId: userId,
        status,
      });

      return reload(tx, forward.id);
    }, options);
  }

  /**
   * Change the status of both rows, log it as a status_change interaction
   * and evaluate the status achievements. Setting the current status again
   * changes nothing.
   */
  async updateStatus(
    partnershipId: string,
    newStatus: PartnershipStatus,
    reason?: string,
    options?: RunOptions
  ): Promise<Partnership> {
    const errors: string[] = [];
    checkStatus(newStatus, errors);
    if (reason !== undefined && typeof reason !== 'string') errors.push('reason must be a string');
    assertValid(errors);

    return transact(this.deps, 'partnership.updateStatus', async (tx, outbox) => {
      const { forward, reverse } = await loadPair(tx, partnershipId);
      if (forward.status === newStatus && reverse.status === newStatus) return forward;

      const previousStatus = forward.status;
      const updatedForward = await tx.partnerships.update({ ...forward, status: newStatus });
      const updatedReverse = await tx.partnerships.update({ ...reverse, status: newStatus });

      await tx.interactions.insert({
        partnershipId: forward.id,
        interactionType: 'status_change',
        content: { status: newStatus, previousStatus, reason: reason ?? null },
        metadata: {},
        questionId: null,
      });

      const metrics = await collectPairMetrics(tx, updatedForward, updatedReverse, this.clock());
      await this.achievements.grantToPair(
        tx,
        updatedForward,
        updatedReverse,
        ['partnership_status'],
        metrics,
        outbox
      );

      outbox.add(partnershipTopic(forward.id), 'status_changed', {
        partnershipId: forward.id,
        status: newStatus,
        previousStatus,
        reason: reason ?? null,
      });

      return reload(tx, forward.id);
    }, options);
  }

  /** Replace the settings of both rows. All three sections are required. */
  async updateSettings(
    partnershipId: string,
    settings: CustomSettings,
    options?: RunOptions
  ): Promise<Partnership> {
    const errors: string[] = [];
    const customSettings = parseCustomSettings(settings, errors);
    assertValid(errors);

    return transact(this.deps, 'partnership.updateSettings', async (tx, outbox) => {
      const { forward, reverse } = await loadPair(tx, partnershipId);
      const next = customSettings ?? forward.customSettings;

      const updated = await tx.partnerships.update({ ...forward, customSettings: next });
      await tx.partnerships.update({ ...reverse, customSettings: next });

      for (const userId of [forward.userId, forward.partnerId]) {
        outbox.add(userTopic(userId), 'settings_updated', {
          partnershipId: forward.id,
          customSettings: next,
        });
      }

      return updated;
    }, options);
  }

  /**
   * Record an interaction through `partnershipId` and update every
   * aggregate that depends on it: pair streak, count, level and milestone
   * on both rows, both members' counters, then the achievements the pair
   * earned.
   */
  async recordInteraction(
    partnershipId: string,
    input: RecordInteractionInput,
    options?: RunOptions
  ): Promise<RecordInteractionResult> {
    return transact(this.deps, 'partnership.recordInteraction', async (tx, outbox) => {
      const now = this.clock();
      const today = toCalendarDay(now);

      const { forward, reverse } = await loadPair(tx, partnershipId);
      const user = await requireUser(tx, forward.userId);
      const partner = await requireUser(tx, forward.partnerId);

      const errors: string[] = [];
      if (!isInteractionType(input.type)) errors.push('type is not a valid interaction type');
      if (!isRecord(input.content)) errors.push('content is required and must be an object');
      if (input.metadata !== undefined && !isRecord(input.metadata)) {
        errors.push('metadata must be an object');
      }
      if (input.questionId != null && typeof input.questionId !== 'string') {
        errors.push('questionId must be a string');
      }
      assertValid(errors);

      const interaction = await tx.interactions.insert({
        partnershipId: forward.id,
        interactionType: input.type,
        content: input.content,
        metadata: input.metadata ?? {},
        questionId: input.questionId ?? null,
      });

      const { streak, longest } = advanceStreak(
        forward.lastInteractionDate,
        today,
        forward.streakDays,
        forward.longestStreak
      );
      const interactionCount = forward.interactionCount + 1;
      const milestone = milestoneFor(interactionCount);
      const crossed = milestone > forward.lastMilestone ? milestone : null;

      const shared = {
        streakDays: streak,
        longestStreak: longest,
        interactionCount,
        partnershipLevel: partnershipLevelFor(interactionCount, forward.partnershipLevel),
        lastInteractionDate: today,
        lastMilestone: Math.max(forward.lastMilestone, milestone),
        stats: {
          ...forward.stats,
          monthlyActivity: bumpMonthlyActivity(forward.stats.monthlyActivity, now),
        },
      };
      const updatedForward = await tx.partnerships.update({ ...forward, ...shared });
      const updatedReverse = await tx.partnerships.update({ ...reverse, ...shared });

      for (const member of [user, partner]) {
        await tx.users.update({
          ...member,
          interactionCount: member.interactionCount + 1,
          lastInteractionDate: today,
          stats: recordUserInteraction(member.stats, input.type, now),
        });
      }

      const metrics = await collectPairMetrics(tx, updatedForward, updatedReverse, now);
      const unlocked = await this.achievements.grantToPair(
        tx,
        updatedForward,
        updatedReverse,
        ['interaction', 'partnership_status'],
        metrics,
        outbox
      );

      const topic = partnershipTopic(forward.id);
      outbox.add(topic, 'new_interaction', {
        partnershipId: forward.id,
        interactionId: interaction.id,
        type: interaction.interactionType,
        streakDays: streak,
        level: shared.partnershipLevel,
      });
      if (crossed !== null) {
        outbox.add(topic, 'milestone_reached', { partnershipId: forward.id, milestone: crossed });
      }

      return { partnership: await reload(tx, forward.id), unlocked, milestone: crossed };
    }, options);
  }

  async getStats(partnershipId: string): Promise<PartnershipStatsView> {
    return this.deps.uow.run(async (tx) => {
      const today = toCalendarDay(this.clock());
      const forward = await reload(tx, partnershipId);
      const reverse = await tx.partnerships.findByPair(forward.partnerId, forward.userId);
      const ids = reverse ? [forward.id, reverse.id] : [forward.id];

      const interactions = await tx.interactions.findByPartnerships(ids);
      const answers = await tx.answers.findByPartnerships(ids);

      const questions = new Map<string, Question>();
      for (const questionId of new Set(answers.map((a) => a.questionId))) {
        const question = await tx.questions.findById(questionId);
        if (question) questions.set(questionId, question);
      }

      return {
        level: forward.partnershipLevel,
        streakDays: forward.streakDays,
        longestStreak: forward.longestStreak,
        totalInteractions: forward.interactionCount,
        daysConnected: Math.max(0, daysBetween(toCalendarDay(forward.createdAt), today)),
        achievements: forward.achievements,
        lastInteractionDate: forward.lastInteractionDate,
        interactionBreakdown: interactionBreakdown(interactions),
        answerBreakdown: answerBreakdown(answers, questions),
      };
    });
  }

  async getPartnership(partnershipId: string): Promise<Partnership> {
    return this.deps.uow.run((tx) => reload(tx, partnershipId));
  }

  async listForUser(userId: string, options: ListPartnershipsOptions = {}): Promise<Partnership[]> {
    if (options.status !== undefined) {
      const errors: string[] = [];
      checkStatus(options.status, errors);
      assertValid(errors);
    }
    return this.deps.uow.run((tx) => tx.partnerships.findByUser(userId, options.status));
  }
}
