/**
 * Achievement catalog and rule table.
 * The single authoritative source for which metric unlocks which achievement
 * and what it is worth. Evaluation is pure: identical snapshots always
 * produce identical results.
 */

import { IntegrityError } from '../errors.js';

export type AchievementCategory = 'interaction' | 'answer' | 'partnership_status';

export interface MetricsSnapshot {
  totalInteractions: number;
  /** Interactions recorded today (UTC). */
  dailyInteractions: number;
  /** Interactions recorded in the trailing seven days. */
  weeklyInteractions: number;
  currentStreak: number;
  longestStreak: number;
  totalAnswers: number;
  answerStreak: number;
  /** Distinct non-skipped answer days in the trailing seven days. */
  perfectWeekDays: number;
  categoryCount: number;
  averageAnswerLength: number;
  partnershipLevel: number;
  daysSinceCreation: number;
  /** 1 when the partnership is active, else 0. */
  isActive: number;
}

export type Metric = keyof MetricsSnapshot;

export interface AchievementRule {
  category: AchievementCategory;
  metric: Metric;
  threshold: number;
  type: string;
}

export interface AchievementDefinition {
  title: string;
  description: string;
  points: number;
}

export const ACHIEVEMENT_CATALOG: Readonly<Record<string, AchievementDefinition>> = {
  // Interaction
  first_interaction: { title: 'First Connection', description: 'Made your first interaction', points: 10 },
  daily_engagement: { title: 'Daily Engaged', description: 'Made 3 or more interactions in a day', points: 15 },
  weekly_dedication: { title: 'Weekly Dedication', description: 'Made 10 or more interactions in a week', points: 25 },
  interaction_milestone_50: { title: 'Fifty Moments', description: 'Reached 50 interactions', points: 50 },
  hundred_interactions: { title: 'Century of Connection', description: 'Reached 100 interactions', points: 100 },
  interaction_milestone_500: { title: 'Inseparable', description: 'Reached 500 interactions', points: 250 },
  daily_streak_3: { title: 'Three Day Streak', description: 'Interacted for 3 days in a row', points: 25 },
  daily_streak_7: { title: 'Week Long Connection', description: 'Interacted for 7 days in a row', points: 50 },
  daily_streak_30: { title: 'Monthly Devotion', description: 'Interacted for 30 days in a row', points: 200 },
  daily_streak_90: { title: 'Seasons Together', description: 'Interacted for 90 days in a row', points: 400 },
  longest_streak_100: { title: 'Hundred Day Bond', description: 'Reached a 100 day streak at least once', points: 300 },

  // Answers
  first_answer: { title: 'First Response', description: 'Answered your first question', points: 10 },
  ten_answers: { title: 'Getting Started', description: 'Answered 10 questions', points: 25 },
  hundred_answers: { title: 'Question Master', description: 'Answered 100 questions', points: 100 },
  no_skips_10: { title: 'Dedicated Responder', description: 'Answered 10 days in a row without skipping', points: 50 },
  answer_streak_30: { title: 'Open Book', description: 'Answered 30 days in a row without skipping', points: 150 },
  perfect_week: { title: 'Perfect Week', description: 'Answered every day for a week', points: 75 },
  varied_answers: { title: 'Curious Mind', description: 'Answered questions from 5 categories', points: 40 },
  thoughtful_responder: { title: 'Thoughtful Responder', description: 'Average answer length of 100 characters', points: 40 },

  // Partnership status
  partnership_started: { title: 'New Beginning', description: 'Started a new partnership', points: 15 },
  partnership_level_5: { title: 'Growing Together', description: 'Reached partnership level 5', points: 50 },
  partnership_level_10: { title: 'Strong Bond', description: 'Reached partnership level 10', points: 100 },
  partnership_level_20: { title: 'Deep Roots', description: 'Reached partnership level 20', points: 200 },
  partnership_1_year: { title: 'One Year Together', description: 'Partnered for a year', points: 365 },
  partnership_2_years: { title: 'Two Years Together', description: 'Partnered for two years', points: 500 },
};

export const ACHIEVEMENT_RULES: readonly AchievementRule[] = [
  { category: 'interaction', metric: 'totalInteractions', threshold: 1, type: 'first_interaction' },
  { category: 'interaction', metric: 'dailyInteractions', threshold: 3, type: 'daily_engagement' },
  { category: 'interaction', metric: 'weeklyInteractions', threshold: 10, type: 'weekly_dedication' },
  { category: 'interaction', metric: 'totalInteractions', threshold: 50, type: 'interaction_milestone_50' },
  { category: 'interaction', metric: 'totalInteractions', threshold: 100, type: 'hundred_interactions' },
  { category: 'interaction', metric: 'totalInteractions', threshold: 500, type: 'interaction_milestone_500' },
  { category: 'interaction', metric: 'currentStreak', threshold: 3, type: 'daily_streak_3' },
  { category: 'interaction', metric: 'currentStreak', threshold: 7, type: 'daily_streak_7' },
  { category: 'interaction', metric: 'currentStreak', threshold: 30, type: 'daily_streak_30' },
  { category: 'interaction', metric: 'currentStreak', threshold: 90, type: 'daily_streak_90' },
  { category: 'interaction', metric: 'longestStreak', threshold: 100, type: 'longest_streak_100' },

  { category: 'answer', metric: 'totalAnswers', threshold: 1, type: 'first_answer' },
  { category: 'answer', metric: 'totalAnswers', threshold: 10, type: 'ten_answers' },
  { category: 'answer', metric: 'totalAnswers', threshold: 100, type: 'hundred_answers' },
  { category: 'answer', metric: 'answerStreak', threshold: 10, type: 'no_skips_10' },
  { category: 'answer', metric: 'answerStreak', threshold: 30, type: 'answer_streak_30' },
  { category: 'answer', metric: 'perfectWeekDays', threshold: 7, type: 'perfect_week' },
  { category: 'answer', metric: 'categoryCount', threshold: 5, type: 'varied_answers' },
  { category: 'answer', metric: 'averageAnswerLength', threshold: 100, type: 'thoughtful_responder' },

  { category: 'partnership_status', metric: 'isActive', threshold: 1, type: 'partnership_started' },
  { category: 'partnership_status', metric: 'partnershipLevel', threshold: 5, type: 'partnership_level_5' },
  { category: 'partnership_status', metric: 'partnershipLevel', threshold: 10, type: 'partnership_level_10' },
  { category: 'partnership_status', metric: 'partnershipLevel', threshold: 20, type: 'partnership_level_20' },
  { category: 'partnership_status', metric: 'daysSinceCreation', threshold: 365, type: 'partnership_1_year' },
  { category: 'partnership_status', metric: 'daysSinceCreation', threshold: 730, type: 'partnership_2_years' },
];

export function emptyMetrics(): MetricsSnapshot {
  return {
    totalInteractions: 0,
    dailyInteractions: 0,
    weeklyInteractions: 0,
    currentStreak: 0,
    longestStreak: 0,
    totalAnswers: 0,
    answerStreak: 0,
    perfectWeekDays: 0,
    categoryCount: 0,
    averageAnswerLength: 0,
    partnershipLevel: 1,
    daysSinceCreation: 0,
    isActive: 0,
  };
}

export function getAchievement(type: string): AchievementDefinition {
  const definition = Object.hasOwn(ACHIEVEMENT_CATALOG, type) ? ACHIEVEMENT_CATALOG[type] : undefined;
  if (!definition) {
    throw new IntegrityError(
      'UNKNOWN_ACHIEVEMENT_TYPE',
      `Achievement type "${type}" has no catalog entry`,
      { type }
    );
  }
  return definition;
}

/**
 * Achievement types in `categories` whose threshold `metrics` meets,
 * minus those in `held`. Sorted for stable output.
 */
export function evaluateAchievements(
  categories: readonly AchievementCategory[],
  metrics: MetricsSnapshot,
  held: Iterable<string>,
  rules: readonly AchievementRule[] = ACHIEVEMENT_RULES
): string[] {
  const heldSet = new Set(held);
  const earned = new Set<string>();

  for (const rule of rules) {
    if (!categories.includes(rule.category)) continue;
    if (metrics[rule.metric] < rule.threshold) continue;
    if (heldSet.has(rule.type)) continue;
    getAchievement(rule.type);
    earned.add(rule.type);
  }

  return [...earned].sort();
}
