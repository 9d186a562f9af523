import { describe, it, expect, beforeEach } from 'vitest';
import { defaultCustomSettings, defaultPartnershipStats } from '../../src/engine/stats.js';
import { InMemoryBackend } from '../../src/repositories/InMemoryBackend.js';
import type { NewPartnership } from '../../src/repositories/ITransaction.js';
import { StagedTransaction } from '../../src/repositories/StagedTransaction.js';
import { TestClock, makeQuestion, makeUser } from '../helpers/fixtures.js';

function newPartnership(userId: string, partnerId: string): NewPartnership {
  return {
    userId,
    partnerId,
    status: 'active',
    nickname: null,
    partnershipLevel: 1,
    streakDays: 0,
    longestStreak: 0,
    interactionCount: 0,
    lastInteractionDate: null,
    lastMilestone: 0,
    achievements: [],
    mutualAnswerCount: 0,
    customSettings: defaultCustomSettings(),
    stats: defaultPartnershipStats(),
  };
}

describe('StagedTransaction', () => {
  let backend: InMemoryBackend;
  let clock: TestClock;
  let tx: StagedTransaction;

  beforeEach(() => {
    backend = new InMemoryBackend();
    backend.putUser(makeUser({ id: 'user-a' }));
    clock = new TestClock('2026-03-02T09:00:00.000Z');
    tx = new StagedTransaction(backend.reader(new AbortController().signal), clock.now);
  });

  it('should read its own staged updates', async () => {
    const user = await tx.users.findById('user-a');
    if (!user) throw new Error('seed missing');
    await tx.users.update({ ...user, points: 40 });

    expect((await tx.users.findById('user-a'))?.points).toBe(40);
    expect(backend.users.get('user-a')?.points).toBe(0);
  });

  it('should keep the version the row was read at', async () => {
    const user = await tx.users.findById('user-a');
    if (!user) throw new Error('seed missing');
    await tx.users.update({ ...user, points: 1 });
    const again = await tx.users.findById('user-a');
    if (!again) throw new Error('staged row missing');
    await tx.users.update({ ...again, points: 2 });

    expect(tx.changeset().updatedUsers).toEqual([expect.objectContaining({ points: 2, version: 1 })]);
  });

  it('should find staged inserts by pair and by user', async () => {
    const row = await tx.partnerships.insert(newPartnership('user-a', 'user-b'));

    expect(row.version).toBe(1);
    expect(row.createdAt.toISOString()).toBe('2026-03-02T09:00:00.000Z');
    expect((await tx.partnerships.findByPair('user-a', 'user-b'))?.id).toBe(row.id);
    expect((await tx.partnerships.findByUser('user-a')).map((p) => p.id)).toEqual([row.id]);
    expect(await tx.partnerships.findByUser('user-a', 'blocked')).toEqual([]);
  });

  it('should fold an update of a staged insert into the insert', async () => {
    const row = await tx.partnerships.insert(newPartnership('user-a', 'user-b'));
    clock.advanceMs(1_000);
    await tx.partnerships.update({ ...row, streakDays: 3 });

    const changeset = tx.changeset();
    expect(changeset.updatedPartnerships).toEqual([]);
    expect(changeset.insertedPartnerships).toHaveLength(1);
    expect(changeset.insertedPartnerships[0].streakDays).toBe(3);
    expect(changeset.insertedPartnerships[0].updatedAt.toISOString()).toBe('2026-03-02T09:00:01.000Z');
  });

  it('should hand out copies that do not alias staged rows', async () => {
    const row = await tx.partnerships.insert(newPartnership('user-a', 'user-b'));
    row.achievements.push('first_interaction');

    expect((await tx.partnerships.findById(row.id))?.achievements).toEqual([]);
  });

  it('should see staged grants and answers', async () => {
    backend.putQuestion(makeQuestion({ id: 'q-1' }));
    await tx.achievements.insert({ userId: 'user-a', achievementType: 'first_answer', grantedAt: clock.now() });
    await tx.answers.insert({
      userId: 'user-a',
      questionId: 'q-1',
      partnershipId: null,
      text: 'yes',
      skipped: false,
      skipReason: null,
      visibility: 'partners_only',
      reactions: [],
      difficultyRating: null,
      metadata: { responseTime: null, editedCount: 0, lastEditedAt: null, wordCount: 1, language: 'en' },
    });

    expect(await tx.achievements.exists('user-a', 'first_answer')).toBe(true);
    expect(await tx.achievements.exists('user-b', 'first_answer')).toBe(false);
    expect((await tx.answers.findByUser('user-a')).map((a) => a.text)).toEqual(['yes']);
  });
});
