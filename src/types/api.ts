/**
 * Operation types: inputs and results of the public service methods.
 * Inputs are validated at runtime as well, since they usually arrive from
 * an HTTP or queue boundary the engine does not control.
 */

import type {
  AnswerVisibility,
  CalendarDay,
  CustomSettings,
  InteractionType,
  Partnership,
  PartnershipStatus,
} from './models.js';
import type { AnswerBreakdown, InteractionBreakdown } from '../engine/stats.js';

// ── Inputs ──

export interface CreatePartnershipInput {
  /** Default: 'pending'. */
  status?: PartnershipStatus;
  /** Applies to the creator's row only. */
  nickname?: string | null;
  customSettings?: CustomSettings;
}

export interface RecordInteractionInput {
  type: InteractionType;
  content: Record<string, unknown>;
  metadata?: Record<string, unknown>;
  questionId?: string | null;
}

export interface SubmitAnswerInput {
  text?: string | null;
  skipped?: boolean;
  skipReason?: string | null;
  partnershipId?: string | null;
  visibility?: AnswerVisibility;
  /** 1 to 10. */
  difficultyRating?: number | null;
  /** Seconds the user took to answer. */
  responseTime?: number | null;
  /** Default: 'en'. */
  language?: string;
}

export interface ListPartnershipsOptions {
  status?: PartnershipStatus;
}

// ── Results ──

export interface PartnershipStatsView {
  level: number;
  streakDays: number;
  longestStreak: number;
  totalInteractions: number;
  daysConnected: number;
  achievements: string[];
  lastInteractionDate: CalendarDay | null;
  interactionBreakdown: InteractionBreakdown;
  answerBreakdown: AnswerBreakdown;
}

export interface RecordInteractionResult {
  partnership: Partnership;
  /** Achievement types the pair earned with this interaction. */
  unlocked: string[];
  /** Set when this interaction reached a new milestone. */
  milestone: number | null;
}
