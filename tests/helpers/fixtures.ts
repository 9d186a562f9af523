import { defaultQuestionStats, defaultUserStats } from '../../src/engine/stats.js';
import type { Question, User } from '../../src/types/models.js';

export const START = '2026-03-02T09:00:00.000Z';

/** Mutable clock for day arithmetic in tests. */
export class TestClock {
  private current: Date;

  constructor(iso: string = START) {
    this.current = new Date(iso);
  }

  readonly now = (): Date => new Date(this.current.getTime());

  advanceDays(days: number): void {
    this.current = new Date(this.current.getTime() + days * 86_400_000);
  }

  advanceMs(ms: number): void {
    this.current = new Date(this.current.getTime() + ms);
  }
}

export function makeUser(overrides: Partial<User> & { id: string }): User {
  return {
    username: overrides.id,
    active: true,
    level: 1,
    highestLevel: 1,
    points: 0,
    streakDays: 0,
    questionsAnswered: 0,
    lastAnswerDate: null,
    interactionCount: 0,
    lastInteractionDate: null,
    stats: defaultUserStats(),
    version: 1,
    createdAt: new Date(START),
    ...overrides,
  };
}

export function makeQuestion(overrides: Partial<Question> & { id: string }): Question {
  return {
    content: `Question ${overrides.id}?`,
    category: 'general',
    difficultyLevel: 1,
    minLevel: null,
    maxLevel: null,
    repeatAfterDays: null,
    active: true,
    stats: defaultQuestionStats(),
    version: 1,
    createdAt: new Date(START),
    ...overrides,
  };
}
