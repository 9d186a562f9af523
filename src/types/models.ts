/**
 * Domain models: core entities as the engine understands them.
 * Decoupled from database row shapes (see database.ts).
 * Calendar days are UTC dates formatted as YYYY-MM-DD.
 */

/** UTC calendar day, e.g. "2026-10-19". */
export type CalendarDay = string;

// ── Users ──

export interface ResponseTimeAggregate {
  count: number;
  totalSeconds: number;
}

export interface UserStats {
  totalInteractions: number;
  interactionTypes: Partial<Record<InteractionType, number>>;
  /** Interaction counts keyed by UTC year-month ("2026-10"). */
  monthlyActivity: Record<string, number>;
  achievements: string[];
  questionCategories: Record<string, number>;
  responseTimes: ResponseTimeAggregate;
}

export interface User {
  id: string;
  username: string;
  active: boolean;
  level: number;
  highestLevel: number;
  points: number;
  /** Consecutive non-skipped answers. */
  streakDays: number;
  questionsAnswered: number;
  lastAnswerDate: CalendarDay | null;
  interactionCount: number;
  lastInteractionDate: CalendarDay | null;
  stats: UserStats;
  version: number;
  createdAt: Date;
}

// ── Partnerships ──

export const PARTNERSHIP_STATUSES = ['pending', 'active', 'inactive', 'blocked'] as const;
export type PartnershipStatus = (typeof PARTNERSHIP_STATUSES)[number];

export interface NotificationPreferences {
  answers: boolean;
  dailyReminder: boolean;
  achievements: boolean;
}

export interface PrivacySettings {
  shareStreak: boolean;
  shareAchievements: boolean;
}

export interface DisplayPreferences {
  showLevel: boolean;
  showStreak: boolean;
}

export interface CustomSettings {
  notificationPreferences: NotificationPreferences;
  privacySettings: PrivacySettings;
  displayPreferences: DisplayPreferences;
}

export interface PartnershipStats {
  questionsAnswered: number;
  questionsSkipped: number;
  totalInteractionTime: number;
  averageResponseTime: number;
  categoryPreferences: Record<string, number>;
  monthlyActivity: Record<string, number>;
}

export interface Partnership {
  id: string;
  userId: string;
  partnerId: string;
  status: PartnershipStatus;
  nickname: string | null;
  partnershipLevel: number;
  streakDays: number;
  longestStreak: number;
  interactionCount: number;
  lastInteractionDate: CalendarDay | null;
  lastMilestone: number;
  achievements: string[];
  mutualAnswerCount: number;
  customSettings: CustomSettings;
  stats: PartnershipStats;
  version: number;
  createdAt: Date;
  updatedAt: Date;
}

/**
 * Fields that must hold the same value on both mirrored rows.
 * Only id, userId, partnerId and nickname may differ.
 */
export const SHARED_PARTNERSHIP_FIELDS = [
  'status',
  'partnershipLevel',
  'streakDays',
  'longestStreak',
  'interactionCount',
  'lastInteractionDate',
  'lastMilestone',
  'achievements',
  'mutualAnswerCount',
  'customSettings',
  'stats',
] as const satisfies readonly (keyof Partnership)[];

export type SharedPartnershipField = (typeof SHARED_PARTNERSHIP_FIELDS)[number];

// ── Interactions ──

export const INTERACTION_TYPES = [
  'message',
  'answer_shared',
  'reaction',
  'achievement',
  'status_change',
] as const;
export type InteractionType = (typeof INTERACTION_TYPES)[number];

export interface Interaction {
  id: string;
  partnershipId: string;
  interactionType: InteractionType;
  content: Record<string, unknown>;
  metadata: Record<string, unknown>;
  questionId: string | null;
  createdAt: Date;
}

// ── Questions & Answers ──

export interface QuestionStats {
  timesAsked: number;
  timesSkipped: number;
  /** Percentage of skipped answers, one decimal. */
  skipRate: number;
  totalResponseLength: number;
  avgResponseLength: number;
  ratedCount: number;
  totalDifficultyRating: number;
  avgDifficultyRating: number;
}

export interface Question {
  id: string;
  content: string;
  category: string;
  difficultyLevel: number;
  minLevel: number | null;
  maxLevel: number | null;
  /** null: a user may answer this question only once. */
  repeatAfterDays: number | null;
  active: boolean;
  stats: QuestionStats;
  version: number;
  createdAt: Date;
}

export const ANSWER_VISIBILITIES = ['partners_only', 'public'] as const;
export type AnswerVisibility = (typeof ANSWER_VISIBILITIES)[number];

export interface AnswerMetadata {
  responseTime: number | null;
  editedCount: number;
  lastEditedAt: Date | null;
  wordCount: number;
  language: string;
}

export interface Answer {
  id: string;
  userId: string;
  questionId: string;
  partnershipId: string | null;
  text: string | null;
  skipped: boolean;
  skipReason: string | null;
  visibility: AnswerVisibility;
  reactions: string[];
  difficultyRating: number | null;
  metadata: AnswerMetadata;
  version: number;
  createdAt: Date;
}

// ── Achievements ──

export interface AchievementGrant {
  id: string;
  userId: string;
  achievementType: string;
  grantedAt: Date;
}
