/**
 * Question service.
 * Answer submission with its ordered precondition checks, reactions and
 * daily question selection.
 */

import { daysBetween, toCalendarDay } from '../engine/calendar.js';
import {
  recordPartnershipAnswer,
  recordUserAnswer,
  updateQuestionStats,
  wordCount,
} from '../engine/stats.js';
import { AnswerRejectedError, NotFoundError } from '../errors.js';
import type { ILogProvider } from '../providers/ILogProvider.js';
import { userTopic } from '../providers/INotificationSink.js';
import type { IUnitOfWork, RunOptions, TransactionScope } from '../repositories/ITransaction.js';
import type { IQuestionCache } from '../stores/IQuestionCache.js';
import { dailyQuestionKey } from '../stores/IQuestionCache.js';
import type { SubmitAnswerInput } from '../types/api.js';
import type { Answer, Question } from '../types/models.js';
import type { AchievementService } from './AchievementService.js';
import { collectAnswerMetrics } from './MetricsCollector.js';
import type { NotificationDispatcher } from './NotificationDispatcher.js';
import type { Outbox } from './NotificationDispatcher.js';
import { loadPair } from './PartnershipService.js';
import { transact } from './transact.js';
import type { TransactDeps } from './transact.js';
import {
  MAX_ANSWER_LENGTH,
  MAX_REACTION_LENGTH,
  assertValid,
  isAnswerVisibility,
} from './validation.js';

const DEFAULT_MIN_LEVEL = 0;
const DEFAULT_MAX_LEVEL = 999;
const DAILY_QUESTION_TTL_MS = 24 * 60 * 60 * 1000;

export interface QuestionServiceOptions {
  clock?: () => Date;
  /** Uniform in [0, 1). Default: Math.random. */
  random?: () => number;
  logProvider?: ILogProvider;
}

function isBlank(value: string | null | undefined): boolean {
  return value === undefined || value === null || value.trim() === '';
}

function checkAnswerInput(input: SubmitAnswerInput): string[] {
  const errors: string[] = [];
  const skipped = input.skipped ?? false;

  if (typeof skipped !== 'boolean') errors.push('skipped must be a boolean');

  if (skipped) {
    if (isBlank(input.skipReason)) errors.push('skipReason is required when skipping');
  } else if (isBlank(input.text)) {
    errors.push('text is required');
  }

  if (typeof input.text === 'string' && input.text.length > MAX_ANSWER_LENGTH) {
    errors.push(`text must be at most ${MAX_ANSWER_LENGTH} characters`);
  }

  const rating = input.difficultyRating;
  if (rating !== undefined && rating !== null && (!Number.isInteger(rating) || rating < 1 || rating > 10)) {
    errors.push('difficultyRating must be an integer from 1 to 10');
  }

  if (input.visibility !== undefined && !isAnswerVisibility(input.visibility)) {
    errors.push('visibility must be one of: partners_only, public');
  }

  const responseTime = input.responseTime;
  if (responseTime !== undefined && responseTime !== null && !(Number.isFinite(responseTime) && responseTime >= 0)) {
    errors.push('responseTime must be a non-negative number');
  }

  return errors;
}

/** Repeat policy over the user's earlier answers to this question. */
function checkRepeat(question: Question, previous: Answer[], today: string): void {
  if (previous.length === 0) return;

  if (question.repeatAfterDays === null) {
    throw new AnswerRejectedError('ALREADY_ANSWERED', 'Question was already answered', {
      questionId: question.id,
    });
  }

  const window = question.repeatAfterDays;
  const tooSoon = previous.some((a) => daysBetween(toCalendarDay(a.createdAt), today) < window);
  if (tooSoon) {
    throw new AnswerRejectedError('TOO_SOON_TO_REPEAT', `Question can be repeated after ${window} days`, {
      questionId: question.id,
      repeatAfterDays: window,
    });
  }
}

export class QuestionService {
  private readonly clock: () => Date;
  private readonly random: () => number;
  private readonly deps: TransactDeps;

  constructor(
    uow: IUnitOfWork,
    private readonly achievements: AchievementService,
    notifier: NotificationDispatcher,
    private readonly cache: IQuestionCache,
    options: QuestionServiceOptions = {}
  ) {
    this.clock = options.clock ?? (() => new Date());
    this.random = options.random ?? Math.random;
    this.deps = { uow, notifier, logProvider: options.logProvider };
  }

  /**
   * Submit (or skip) an answer. Every precondition is checked, in a fixed
   * order, before anything is written; the first failure is the error.
   * Today's cached pick is dropped once the user answered it.
   */
  async submitAnswer(
    userId: string,
    questionId: string,
    input: SubmitAnswerInput,
    options?: RunOptions
  ): Promise<Answer> {
    const answer = await transact(this.deps, 'question.submitAnswer', async (tx, outbox) => {
      const now = this.clock();
      const today = toCalendarDay(now);

      const user = await tx.users.findById(userId);
      if (!user) {
        throw new AnswerRejectedError('USER_NOT_FOUND', `User "${userId}" not found`, { userId });
      }
      if (!user.active) {
        throw new AnswerRejectedError('INACTIVE_USER', 'User is not active', { userId });
      }

      const question = await tx.questions.findById(questionId);
      if (!question) {
        throw new AnswerRejectedError('QUESTION_NOT_FOUND', `Question "${questionId}" not found`, { questionId });
      }
      if (!question.active) {
        throw new AnswerRejectedError('INACTIVE_QUESTION', 'Question is no longer active', { questionId });
      }

      const previous = (await tx.answers.findByUser(userId)).filter((a) => a.questionId === questionId);
      if (previous.some((a) => toCalendarDay(a.createdAt) === today)) {
        throw new AnswerRejectedError('ALREADY_ANSWERED_TODAY', 'Question was already answered today', {
          userId,
          questionId,
          day: today,
        });
      }

      const minLevel = question.minLevel ?? DEFAULT_MIN_LEVEL;
      const maxLevel = question.maxLevel ?? DEFAULT_MAX_LEVEL;
      if (user.level < minLevel || user.level > maxLevel) {
        throw new AnswerRejectedError('LEVEL_MISMATCH', 'Question is not available at this level', {
          level: user.level,
          minLevel,
          maxLevel,
        });
      }

      checkRepeat(question, previous, today);
      assertValid(checkAnswerInput(input));

      const partnershipId = input.partnershipId ?? null;
      if (partnershipId !== null) {
        const partnership = await tx.partnerships.findById(partnershipId);
        if (!partnership || partnership.userId !== userId) {
          throw new NotFoundError(`Partnership "${partnershipId}" not found for user`, {
            partnershipId,
            userId,
          });
        }
      }

      const skipped = input.skipped ?? false;
      const text = isBlank(input.text) ? null : (input.text ?? null);
      const responseTime = input.responseTime ?? null;

      const answer = await tx.answers.insert({
        userId,
        questionId,
        partnershipId,
        text,
        skipped,
        skipReason: skipped ? (input.skipReason ?? null) : null,
        visibility: input.visibility ?? 'partners_only',
        reactions: [],
        difficultyRating: input.difficultyRating ?? null,
        metadata: {
          responseTime,
          editedCount: 0,
          lastEditedAt: null,
          wordCount: wordCount(text),
          language: input.language ?? 'en',
        },
      });

      await tx.users.update({
        ...user,
        questionsAnswered: user.questionsAnswered + 1,
        streakDays: skipped ? 0 : user.streakDays + 1,
        lastAnswerDate: today,
        stats: skipped ? user.stats : recordUserAnswer(user.stats, question.category, responseTime),
      });

      await tx.questions.update({ ...question, stats: updateQuestionStats(question.stats, answer) });

      if (partnershipId !== null) {
        await this.shareWithPartnership(tx, answer, question, partnershipId);
      }

      const metrics = await collectAnswerMetrics(tx, userId, now);
      await this.achievements.grantToUser(tx, userId, ['answer'], metrics, outbox);

      await this.notifyPartners(tx, answer, outbox);
      return answer;
    }, options);

    const key = dailyQuestionKey(userId, toCalendarDay(answer.createdAt));
    const cached = await this.cache.get(key);
    if (cached?.id === questionId) await this.cache.delete(key);

    return answer;
  }

  /** Append a reaction to an answer and tell its author. */
  async addReaction(
    answerId: string,
    userId: string,
    reaction: string,
    options?: RunOptions
  ): Promise<Answer> {
    const token = typeof reaction === 'string' ? reaction.trim() : '';
    const errors: string[] = [];
    if (token === '') errors.push('reaction is required');
    if (token.length > MAX_REACTION_LENGTH) {
      errors.push(`reaction must be at most ${MAX_REACTION_LENGTH} characters`);
    }
    assertValid(errors);

    return transact(this.deps, 'question.addReaction', async (tx, outbox) => {
      const answer = await tx.answers.findById(answerId);
      if (!answer) throw new NotFoundError(`Answer "${answerId}" not found`, { answerId });

      const reactor = await tx.users.findById(userId);
      if (!reactor) throw new NotFoundError(`User "${userId}" not found`, { userId });

      const updated = await tx.answers.update({ ...answer, reactions: [...answer.reactions, token] });

      outbox.add(userTopic(answer.userId), 'new_reaction', {
        answerId,
        userId,
        reaction: token,
      });
      return updated;
    }, options);
  }

  /**
   * Today's question for the user: the cached pick if there is one, else
   * a uniform pick among active questions within the user's reach that
   * they never answered.
   */
  async getDailyQuestion(userId: string): Promise<Question> {
    const key = dailyQuestionKey(userId, toCalendarDay(this.clock()));
    const cached = await this.cache.get(key);
    if (cached) return cached;

    const question = await this.deps.uow.run(async (tx) => {
      const user = await tx.users.findById(userId);
      if (!user) {
        throw new AnswerRejectedError('USER_NOT_FOUND', `User "${userId}" not found`, { userId });
      }

      const answered = new Set((await tx.answers.findByUser(userId)).map((a) => a.questionId));
      const candidates = (await tx.questions.findActive())
        .filter((q) => q.difficultyLevel <= user.highestLevel && !answered.has(q.id))
        .sort((a, b) => a.id.localeCompare(b.id));

      if (candidates.length === 0) {
        throw new AnswerRejectedError('NO_QUESTIONS_AVAILABLE', 'No unanswered questions available', { userId });
      }

      const index = Math.min(candidates.length - 1, Math.floor(this.random() * candidates.length));
      return candidates[index];
    });

    await this.cache.put(key, question, DAILY_QUESTION_TTL_MS);
    return question;
  }

  // ── Private ──

  /** Fold the answer into both rows' stats and record it as shared. */
  private async shareWithPartnership(
    tx: TransactionScope,
    answer: Answer,
    question: Question,
    partnershipId: string
  ): Promise<void> {
    const { forward, reverse } = await loadPair(tx, partnershipId);

    const partnerAnswered =
      !answer.skipped &&
      (await tx.answers.findByPartnerships([forward.id, reverse.id])).some(
        (a) => a.userId === forward.partnerId && a.questionId === question.id && !a.skipped
      );

    const shared = {
      stats: recordPartnershipAnswer(forward.stats, question.category, answer.skipped, answer.metadata.responseTime),
      mutualAnswerCount: forward.mutualAnswerCount + (partnerAnswered ? 1 : 0),
    };
    await tx.partnerships.update({ ...forward, ...shared });
    await tx.partnerships.update({ ...reverse, ...shared });

    await tx.interactions.insert({
      partnershipId: forward.id,
      interactionType: 'answer_shared',
      content: { answerId: answer.id, skipped: answer.skipped },
      metadata: {},
      questionId: question.id,
    });
  }

  private async notifyPartners(tx: TransactionScope, answer: Answer, outbox: Outbox): Promise<void> {
    const active = await tx.partnerships.findByUser(answer.userId, 'active');
    for (const partnership of active) {
      outbox.add(userTopic(partnership.partnerId), 'new_answer', {
        answerId: answer.id,
        questionId: answer.questionId,
        fromUserId: answer.userId,
        partnershipId: partnership.id,
        skipped: answer.skipped,
      });
    }
  }
}
