/**
 * Row ⇄ model mapping for the Supabase backend.
 * jsonb records are merged over their defaults so rows written before a
 * field existed still read as complete records.
 */

import type {
  AchievementGrant,
  Answer,
  Interaction,
  Partnership,
  Question,
  User,
} from '../types/models.js';
import type {
  AnswerRow,
  ChangesetPayload,
  InteractionRow,
  PartnershipRow,
  QuestionRow,
  UserAchievementRow,
  UserRow,
} from '../types/database.js';
import type { Changeset } from './ITransactionBackend.js';
import {
  defaultPartnershipStats,
  defaultQuestionStats,
  defaultUserStats,
} from '../engine/stats.js';

export function rowToUser(row: UserRow): User {
  return {
    id: row.id,
    username: row.username,
    active: row.active,
    level: row.level,
    highestLevel: row.highest_level,
    points: row.points,
    streakDays: row.streak_days,
    questionsAnswered: row.questions_answered,
    lastAnswerDate: row.last_answer_date,
    interactionCount: row.interaction_count,
    lastInteractionDate: row.last_interaction_date,
    stats: { ...defaultUserStats(), ...row.stats },
    version: row.version,
    createdAt: new Date(row.inserted_at),
  };
}

export function userToRow(user: User): UserRow {
  return {
    id: user.id,
    username: user.username,
    active: user.active,
    level: user.level,
    highest_level: user.highestLevel,
    points: user.points,
    streak_days: user.streakDays,
    questions_answered: user.questionsAnswered,
    last_answer_date: user.lastAnswerDate,
    interaction_count: user.interactionCount,
    last_interaction_date: user.lastInteractionDate,
    stats: user.stats,
    version: user.version,
    inserted_at: user.createdAt.toISOString(),
  };
}

export function rowToPartnership(row: PartnershipRow): Partnership {
  return {
    id: row.id,
    userId: row.user_id,
    partnerId: row.partner_id,
    status: row.status,
    nickname: row.nickname,
    partnershipLevel: row.partnership_level,
    streakDays: row.streak_days,
    longestStreak: row.longest_streak,
    interactionCount: row.interaction_count,
    lastInteractionDate: row.last_interaction_date,
    lastMilestone: row.last_milestone,
    achievements: row.achievements ?? [],
    mutualAnswerCount: row.mutual_answer_count,
    customSettings: row.custom_settings,
    stats: { ...defaultPartnershipStats(), ...row.stats },
    version: row.version,
    createdAt: new Date(row.inserted_at),
    updatedAt: new Date(row.updated_at),
  };
}

export function partnershipToRow(p: Partnership): PartnershipRow {
  return {
    id: p.id,
    user_id: p.userId,
    partner_id: p.partnerId,
    status: p.status,
    nickname: p.nickname,
    partnership_level: p.partnershipLevel,
    streak_days: p.streakDays,
    longest_streak: p.longestStreak,
    interaction_count: p.interactionCount,
    last_interaction_date: p.lastInteractionDate,
    last_milestone: p.lastMilestone,
    achievements: p.achievements,
    mutual_answer_count: p.mutualAnswerCount,
    custom_settings: p.customSettings,
    stats: p.stats,
    version: p.version,
    inserted_at: p.createdAt.toISOString(),
    updated_at: p.updatedAt.toISOString(),
  };
}

export function rowToInteraction(row: InteractionRow): Interaction {
  return {
    id: row.id,
    partnershipId: row.partnership_id,
    interactionType: row.interaction_type,
    content: row.content,
    metadata: row.metadata ?? {},
    questionId: row.question_id,
    createdAt: new Date(row.inserted_at),
  };
}

export function interactionToRow(i: Interaction): InteractionRow {
  return {
    id: i.id,
    partnership_id: i.partnershipId,
    interaction_type: i.interactionType,
    content: i.content,
    metadata: i.metadata,
    question_id: i.questionId,
    inserted_at: i.createdAt.toISOString(),
  };
}

export function rowToGrant(row: UserAchievementRow): AchievementGrant {
  return {
    id: row.id,
    userId: row.user_id,
    achievementType: row.achievement_type,
    grantedAt: new Date(row.granted_at),
  };
}

export function grantToRow(g: AchievementGrant): UserAchievementRow {
  return {
    id: g.id,
    user_id: g.userId,
    achievement_type: g.achievementType,
    granted_at: g.grantedAt.toISOString(),
  };
}

export function rowToQuestion(row: QuestionRow): Question {
  return {
    id: row.id,
    content: row.content,
    category: row.category,
    difficultyLevel: row.difficulty_level,
    minLevel: row.min_level,
    maxLevel: row.max_level,
    repeatAfterDays: row.repeat_after_days,
    active: row.active,
    stats: { ...defaultQuestionStats(), ...row.stats },
    version: row.version,
    createdAt: new Date(row.inserted_at),
  };
}

export function questionToRow(q: Question): QuestionRow {
  return {
    id: q.id,
    content: q.content,
    category: q.category,
    difficulty_level: q.difficultyLevel,
    min_level: q.minLevel,
    max_level: q.maxLevel,
    repeat_after_days: q.repeatAfterDays,
    active: q.active,
    stats: q.stats,
    version: q.version,
    inserted_at: q.createdAt.toISOString(),
  };
}

export function rowToAnswer(row: AnswerRow): Answer {
  return {
    id: row.id,
    userId: row.user_id,
    questionId: row.question_id,
    partnershipId: row.partnership_id,
    text: row.text,
    skipped: row.skipped,
    skipReason: row.skip_reason,
    visibility: row.visibility,
    reactions: row.reactions ?? [],
    difficultyRating: row.difficulty_rating,
    metadata: {
      ...row.metadata,
      lastEditedAt: row.metadata.lastEditedAt ? new Date(row.metadata.lastEditedAt) : null,
    },
    version: row.version,
    createdAt: new Date(row.inserted_at),
  };
}

export function answerToRow(a: Answer): AnswerRow {
  return {
    id: a.id,
    user_id: a.userId,
    question_id: a.questionId,
    partnership_id: a.partnershipId,
    text: a.text,
    skipped: a.skipped,
    skip_reason: a.skipReason,
    visibility: a.visibility,
    reactions: a.reactions,
    difficulty_rating: a.difficultyRating,
    metadata: {
      ...a.metadata,
      lastEditedAt: a.metadata.lastEditedAt ? a.metadata.lastEditedAt.toISOString() : null,
    },
    version: a.version,
    inserted_at: a.createdAt.toISOString(),
  };
}

export function changesetToPayload(changeset: Changeset): ChangesetPayload {
  return {
    inserted_partnerships: changeset.insertedPartnerships.map(partnershipToRow),
    updated_partnerships: changeset.updatedPartnerships.map(partnershipToRow),
    updated_users: changeset.updatedUsers.map(userToRow),
    inserted_interactions: changeset.insertedInteractions.map(interactionToRow),
    inserted_grants: changeset.insertedGrants.map(grantToRow),
    updated_questions: changeset.updatedQuestions.map(questionToRow),
    inserted_answers: changeset.insertedAnswers.map(answerToRow),
    updated_answers: changeset.updatedAnswers.map(answerToRow),
  };
}
