/**
 * Database row types. They mirror the Postgres tables in supabase/migrations.
 * Kept separate so the database can evolve independently of domain models.
 * Column names use snake_case; jsonb columns hold the typed records from
 * models.ts as-is.
 */

import type {
  AnswerVisibility,
  CustomSettings,
  InteractionType,
  PartnershipStats,
  PartnershipStatus,
  QuestionStats,
  UserStats,
} from './models.js';

export interface UserRow {
  id: string;
  username: string;
  active: boolean;
  level: number;
  highest_level: number;
  points: number;
  streak_days: number;
  questions_answered: number;
  last_answer_date: string | null;
  interaction_count: number;
  last_interaction_date: string | null;
  stats: Partial<UserStats> | null;
  version: number;
  inserted_at: string;
}

export interface PartnershipRow {
  id: string;
  user_id: string;
  partner_id: string;
  status: PartnershipStatus;
  nickname: string | null;
  partnership_level: number;
  streak_days: number;
  longest_streak: number;
  interaction_count: number;
  last_interaction_date: string | null;
  last_milestone: number;
  achievements: string[];
  mutual_answer_count: number;
  custom_settings: CustomSettings;
  stats: Partial<PartnershipStats> | null;
  version: number;
  inserted_at: string;
  updated_at: string;
}

export interface InteractionRow {
  id: string;
  partnership_id: string;
  interaction_type: InteractionType;
  content: Record<string, unknown>;
  metadata: Record<string, unknown> | null;
  question_id: string | null;
  inserted_at: string;
}

export interface UserAchievementRow {
  id: string;
  user_id: string;
  achievement_type: string;
  granted_at: string;
}

export interface QuestionRow {
  id: string;
  content: string;
  category: string;
  difficulty_level: number;
  min_level: number | null;
  max_level: number | null;
  repeat_after_days: number | null;
  active: boolean;
  stats: Partial<QuestionStats> | null;
  version: number;
  inserted_at: string;
}

export interface AnswerMetadataJson {
  responseTime: number | null;
  editedCount: number;
  lastEditedAt: string | null;
  wordCount: number;
  language: string;
}

export interface AnswerRow {
  id: string;
  user_id: string;
  question_id: string;
  partnership_id: string | null;
  text: string | null;
  skipped: boolean;
  skip_reason: string | null;
  visibility: AnswerVisibility;
  reactions: string[];
  difficulty_rating: number | null;
  metadata: AnswerMetadataJson;
  version: number;
  inserted_at: string;
}

/** Payload of the apply_changeset() Postgres function. */
export interface ChangesetPayload {
  inserted_partnerships: PartnershipRow[];
  updated_partnerships: PartnershipRow[];
  updated_users: UserRow[];
  inserted_interactions: InteractionRow[];
  inserted_grants: UserAchievementRow[];
  updated_questions: QuestionRow[];
  inserted_answers: AnswerRow[];
  updated_answers: AnswerRow[];
}

export type ChangesetResult =
  | { status: 'ok' }
  | { status: 'conflict'; reason: string };
