/**
 * Builds achievement metric snapshots from transaction-scoped reads.
 * Pair metrics count interactions recorded through either mirror row.
 */

import { emptyMetrics } from '../engine/achievements.js';
import type { MetricsSnapshot } from '../engine/achievements.js';
import { addDays, daysBetween, startOfDay, toCalendarDay } from '../engine/calendar.js';
import { averageAnswerLength } from '../engine/stats.js';
import { answerStreak, answeredDaysInWindow } from '../engine/streak.js';
import type { TransactionScope } from '../repositories/ITransaction.js';
import type { Partnership } from '../types/models.js';

const WEEK_DAYS = 7;

export async function collectPairMetrics(
  tx: TransactionScope,
  forward: Partnership,
  reverse: Partnership,
  now: Date
): Promise<MetricsSnapshot> {
  const today = toCalendarDay(now);
  const todayStart = startOfDay(now);
  const weekStart = new Date(`${addDays(today, -(WEEK_DAYS - 1))}T00:00:00.000Z`);
  const recent = await tx.interactions.findByPartnerships([forward.id, reverse.id], weekStart);

  return {
    ...emptyMetrics(),
    totalInteractions: forward.interactionCount,
    dailyInteractions: recent.filter((i) => i.createdAt >= todayStart).length,
    weeklyInteractions: recent.length,
    currentStreak: forward.streakDays,
    longestStreak: forward.longestStreak,
    partnershipLevel: forward.partnershipLevel,
    daysSinceCreation: Math.max(0, daysBetween(toCalendarDay(forward.createdAt), today)),
    isActive: forward.status === 'active' ? 1 : 0,
  };
}

export async function collectAnswerMetrics(
  tx: TransactionScope,
  userId: string,
  now: Date
): Promise<MetricsSnapshot> {
  const today = toCalendarDay(now);
  const answers = await tx.answers.findByUser(userId);
  const written = answers.filter((a) => !a.skipped);
  const days = answers.map((a) => ({ date: toCalendarDay(a.createdAt), skipped: a.skipped }));

  const categories = new Set<string>();
  for (const questionId of new Set(written.map((a) => a.questionId))) {
    const question = await tx.questions.findById(questionId);
    if (question) categories.add(question.category);
  }

  return {
    ...emptyMetrics(),
    totalAnswers: written.length,
    answerStreak: answerStreak(days, today),
    perfectWeekDays: answeredDaysInWindow(days, today, WEEK_DAYS),
    categoryCount: categories.size,
    averageAnswerLength: averageAnswerLength(answers),
  };
}
