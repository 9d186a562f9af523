import { describe, it, expect } from 'vitest';
import { defaultUserStats } from '../../src/engine/stats.js';
import {
  answerToRow,
  changesetToPayload,
  rowToAnswer,
  rowToPartnership,
  rowToUser,
} from '../../src/repositories/mappers.js';
import type { PartnershipRow, UserRow } from '../../src/types/database.js';
import type { Answer } from '../../src/types/models.js';
import { makeUser } from '../helpers/fixtures.js';

describe('mappers', () => {
  it('should fill missing stats fields from defaults', () => {
    const row: UserRow = {
      id: 'user-a',
      username: 'alex',
      active: true,
      level: 3,
      highest_level: 4,
      points: 120,
      streak_days: 2,
      questions_answered: 9,
      last_answer_date: '2026-03-01',
      interaction_count: 14,
      last_interaction_date: '2026-03-02',
      stats: { totalInteractions: 14 },
      version: 6,
      inserted_at: '2026-01-10T08:00:00.000Z',
    };

    const user = rowToUser(row);
    expect(user.stats).toEqual({ ...defaultUserStats(), totalInteractions: 14 });
    expect(user.highestLevel).toBe(4);
    expect(user.createdAt.toISOString()).toBe('2026-01-10T08:00:00.000Z');
  });

  it('should map partnership columns to fields', () => {
    const row: PartnershipRow = {
      id: 'p-1',
      user_id: 'user-a',
      partner_id: 'user-b',
      status: 'active',
      nickname: 'Sunny',
      partnership_level: 2,
      streak_days: 4,
      longest_streak: 6,
      interaction_count: 21,
      last_interaction_date: '2026-03-02',
      last_milestone: 20,
      achievements: ['first_interaction'],
      mutual_answer_count: 1,
      custom_settings: {
        notificationPreferences: { answers: true, dailyReminder: false, achievements: true },
        privacySettings: { shareStreak: true, shareAchievements: true },
        displayPreferences: { showLevel: true, showStreak: false },
      },
      stats: null,
      version: 3,
      inserted_at: '2026-02-01T00:00:00.000Z',
      updated_at: '2026-03-02T10:00:00.000Z',
    };

    expect(rowToPartnership(row)).toMatchObject({
      userId: 'user-a',
      partnerId: 'user-b',
      partnershipLevel: 2,
      longestStreak: 6,
      lastMilestone: 20,
      achievements: ['first_interaction'],
      stats: { questionsAnswered: 0, monthlyActivity: {} },
    });
  });

  it('should carry answer edit timestamps through jsonb as ISO strings', () => {
    const answer: Answer = {
      id: 'a-1',
      userId: 'user-a',
      questionId: 'q-1',
      partnershipId: null,
      text: 'blue',
      skipped: false,
      skipReason: null,
      visibility: 'public',
      reactions: ['heart'],
      difficultyRating: 3,
      metadata: {
        responseTime: 12,
        editedCount: 1,
        lastEditedAt: new Date('2026-03-02T11:00:00.000Z'),
        wordCount: 1,
        language: 'en',
      },
      version: 2,
      createdAt: new Date('2026-03-02T10:00:00.000Z'),
    };

    const row = answerToRow(answer);
    expect(row.metadata.lastEditedAt).toBe('2026-03-02T11:00:00.000Z');
    expect(row.inserted_at).toBe('2026-03-02T10:00:00.000Z');
    expect(rowToAnswer(row)).toEqual(answer);
  });

  it('should build the apply_changeset payload with snake_case rows', () => {
    const payload = changesetToPayload({
      insertedPartnerships: [],
      updatedPartnerships: [],
      updatedUsers: [makeUser({ id: 'user-a', points: 10 })],
      insertedInteractions: [],
      insertedGrants: [{ id: 'g-1', userId: 'user-a', achievementType: 'first_answer', grantedAt: new Date('2026-03-02T10:00:00.000Z') }],
      updatedQuestions: [],
      insertedAnswers: [],
      updatedAnswers: [],
    });

    expect(payload.updated_users[0]).toMatchObject({ id: 'user-a', points: 10, highest_level: 1, version: 1 });
    expect(payload.inserted_grants).toEqual([
      { id: 'g-1', user_id: 'user-a', achievement_type: 'first_answer', granted_at: '2026-03-02T10:00:00.000Z' },
    ]);
  });
});
