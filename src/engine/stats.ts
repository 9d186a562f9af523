/**
 * Stats aggregator.
 * Default records, incremental aggregate updates and read-side breakdowns.
 * Everything returns fresh objects; inputs are never mutated.
 */

import type {
  Answer,
  CustomSettings,
  Interaction,
  InteractionType,
  PartnershipStats,
  Question,
  QuestionStats,
  UserStats,
} from '../types/models.js';
import { monthKey } from './calendar.js';

export const MAX_PARTNERSHIP_LEVEL = 100;
export const INTERACTIONS_PER_LEVEL = 20;
export const MILESTONE_STEP = 10;

export function defaultUserStats(): UserStats {
  return {
    totalInteractions: 0,
    interactionTypes: {},
    monthlyActivity: {},
    achievements: [],
    questionCategories: {},
    responseTimes: { count: 0, totalSeconds: 0 },
  };
}

export function defaultPartnershipStats(): PartnershipStats {
  return {
    questionsAnswered: 0,
    questionsSkipped: 0,
    totalInteractionTime: 0,
    averageResponseTime: 0,
    categoryPreferences: {},
    monthlyActivity: {},
  };
}

export function defaultQuestionStats(): QuestionStats {
  return {
    timesAsked: 0,
    timesSkipped: 0,
    skipRate: 0,
    totalResponseLength: 0,
    avgResponseLength: 0,
    ratedCount: 0,
    totalDifficultyRating: 0,
    avgDifficultyRating: 0,
  };
}

export function defaultCustomSettings(): CustomSettings {
  return {
    notificationPreferences: { answers: true, dailyReminder: true, achievements: true },
    privacySettings: { shareStreak: true, shareAchievements: true },
    displayPreferences: { showLevel: true, showStreak: true },
  };
}

function round1(value: number): number {
  return Math.round(value * 10) / 10;
}

function increment(record: Record<string, number>, key: string, by = 1): Record<string, number> {
  return { ...record, [key]: (record[key] ?? 0) + by };
}

export function bumpMonthlyActivity(
  activity: Record<string, number>,
  at: Date
): Record<string, number> {
  return increment(activity, monthKey(at));
}

export function recordUserInteraction(
  stats: UserStats,
  type: InteractionType,
  at: Date
): UserStats {
  return {
    ...stats,
    totalInteractions: stats.totalInteractions + 1,
    interactionTypes: { ...stats.interactionTypes, [type]: (stats.interactionTypes[type] ?? 0) + 1 },
    monthlyActivity: bumpMonthlyActivity(stats.monthlyActivity, at),
  };
}

export function recordUserAnswer(
  stats: UserStats,
  category: string,
  responseTime: number | null
): UserStats {
  return {
    ...stats,
    questionCategories: increment(stats.questionCategories, category),
    responseTimes:
      responseTime === null
        ? stats.responseTimes
        : {
            count: stats.responseTimes.count + 1,
            totalSeconds: stats.responseTimes.totalSeconds + responseTime,
          },
  };
}

export function recordPartnershipAnswer(
  stats: PartnershipStats,
  category: string,
  skipped: boolean,
  responseTime: number | null
): PartnershipStats {
  const answered = stats.questionsAnswered + 1;
  const timed = responseTime === null ? stats.totalInteractionTime : stats.totalInteractionTime + responseTime;
  return {
    ...stats,
    questionsAnswered: answered,
    questionsSkipped: stats.questionsSkipped + (skipped ? 1 : 0),
    totalInteractionTime: timed,
    averageResponseTime: round1(timed / answered),
    categoryPreferences: skipped ? stats.categoryPreferences : increment(stats.categoryPreferences, category),
  };
}

/** Fold one new answer into a question's running aggregates. */
export function updateQuestionStats(stats: QuestionStats, answer: Answer): QuestionStats {
  const timesAsked = stats.timesAsked + 1;
  const timesSkipped = stats.timesSkipped + (answer.skipped ? 1 : 0);
  const answeredCount = timesAsked - timesSkipped;

  const totalResponseLength =
    stats.totalResponseLength + (answer.skipped ? 0 : (answer.text ?? '').length);

  const rated = !answer.skipped && answer.difficultyRating !== null;
  const ratedCount = stats.ratedCount + (rated ? 1 : 0);
  const totalDifficultyRating = stats.totalDifficultyRating + (rated ? answer.difficultyRating ?? 0 : 0);

  return {
    timesAsked,
    timesSkipped,
    skipRate: round1((timesSkipped / timesAsked) * 100),
    totalResponseLength,
    avgResponseLength: answeredCount > 0 ? round1(totalResponseLength / answeredCount) : 0,
    ratedCount,
    totalDifficultyRating,
    avgDifficultyRating: ratedCount > 0 ? round1(totalDifficultyRating / ratedCount) : 0,
  };
}

/** Level grows with interactions and never goes down. */
export function partnershipLevelFor(interactionCount: number, currentLevel: number): number {
  const earned = Math.min(MAX_PARTNERSHIP_LEVEL, 1 + Math.floor(interactionCount / INTERACTIONS_PER_LEVEL));
  return Math.max(currentLevel, earned);
}

export function milestoneFor(interactionCount: number): number {
  return Math.floor(interactionCount / MILESTONE_STEP) * MILESTONE_STEP;
}

export function wordCount(text: string | null): number {
  if (!text) return 0;
  const trimmed = text.trim();
  return trimmed === '' ? 0 : trimmed.split(/\s+/).length;
}

export type InteractionBreakdown = Partial<Record<InteractionType, number>>;

export function interactionBreakdown(interactions: readonly Interaction[]): InteractionBreakdown {
  const breakdown: InteractionBreakdown = {};
  for (const interaction of interactions) {
    breakdown[interaction.interactionType] = (breakdown[interaction.interactionType] ?? 0) + 1;
  }
  return breakdown;
}

export interface AnswerBreakdown {
  total: number;
  skipped: number;
  /** Percentage, one decimal. */
  skipRate: number;
  categories: Record<string, number>;
}

export function answerBreakdown(
  answers: readonly Answer[],
  questions: ReadonlyMap<string, Question>
): AnswerBreakdown {
  let skipped = 0;
  let categories: Record<string, number> = {};

  for (const answer of answers) {
    if (answer.skipped) skipped += 1;
    const category = questions.get(answer.questionId)?.category;
    if (category) categories = increment(categories, category);
  }

  return {
    total: answers.length,
    skipped,
    skipRate: answers.length > 0 ? round1((skipped / answers.length) * 100) : 0,
    categories,
  };
}

/** Mean length of non-skipped answer texts, one decimal. */
export function averageAnswerLength(answers: readonly Answer[]): number {
  const written = answers.filter((a) => !a.skipped);
  if (written.length === 0) return 0;
  const total = written.reduce((sum, a) => sum + (a.text ?? '').length, 0);
  return round1(total / written.length);
}
