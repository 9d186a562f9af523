import { describe, it, expect, beforeEach } from 'vitest';
import { emptyMetrics } from '../../src/engine/achievements.js';
import { IntegrityError } from '../../src/errors.js';
import { Outbox } from '../../src/services/NotificationDispatcher.js';
import { makeUser } from '../helpers/fixtures.js';
import { createHarness, seedPair, type Harness } from '../helpers/harness.js';

describe('AchievementService', () => {
  let h: Harness;

  beforeEach(() => {
    h = createHarness();
    h.backend.putUser(makeUser({ id: 'user-a' }));
  });

  it('should grant an achievement once', async () => {
    const first = new Outbox();
    const second = new Outbox();

    const granted = await h.unitOfWork.run((tx) => h.achievementService.grant(tx, 'user-a', 'first_answer', first));
    const again = await h.unitOfWork.run((tx) => h.achievementService.grant(tx, 'user-a', 'first_answer', second));

    expect(granted).toBe(true);
    expect(again).toBe(false);
    expect(h.backend.users.get('user-a')).toMatchObject({ points: 10, stats: { achievements: ['first_answer'] } });
    expect(h.backend.grants).toHaveLength(1);
    expect(first.notifications).toHaveLength(1);
    expect(second.notifications).toEqual([]);
  });

  it('should refuse a type missing from the catalog', async () => {
    const attempt = h.unitOfWork.run((tx) => h.achievementService.grant(tx, 'user-a', 'made_up', new Outbox()));

    await expect(attempt).rejects.toBeInstanceOf(IntegrityError);
    await expect(attempt).rejects.toMatchObject({ code: 'UNKNOWN_ACHIEVEMENT_TYPE' });
    expect(h.backend.grants).toEqual([]);
  });

  it('should refuse an unknown user', async () => {
    await expect(
      h.unitOfWork.run((tx) => h.achievementService.grant(tx, 'ghost', 'first_answer', new Outbox()))
    ).rejects.toMatchObject({ code: 'NOT_FOUND' });
  });

  it('should grant every user rule the metrics meet', async () => {
    const box = new Outbox();

    const earned = await h.unitOfWork.run((tx) =>
      h.achievementService.grantToUser(tx, 'user-a', ['answer'], { ...emptyMetrics(), totalAnswers: 10 }, box)
    );

    expect(earned).toEqual(['first_answer', 'ten_answers']);
    expect(h.backend.users.get('user-a')?.points).toBe(35);
    expect(box.notifications.map((n) => n.payload.achievementType)).toEqual(['first_answer', 'ten_answers']);
  });

  it('should grant pair achievements to both members and both rows', async () => {
    const { forward, reverse } = await seedPair(h);
    const box = new Outbox();

    const earned = await h.unitOfWork.run(async (tx) => {
      const f = await tx.partnerships.findById(forward.id);
      const r = await tx.partnerships.findById(reverse.id);
      if (!f || !r) throw new Error('seed missing');
      return h.achievementService.grantToPair(
        tx,
        f,
        r,
        ['interaction', 'partnership_status'],
        { ...emptyMetrics(), totalInteractions: 1, isActive: 1 },
        box
      );
    });

    expect(earned).toEqual(['first_interaction']);
    for (const id of [forward.id, reverse.id]) {
      expect(h.backend.partnerships.get(id)?.achievements).toEqual(['partnership_started', 'first_interaction']);
    }
    expect(box.notifications.map((n) => n.topic)).toEqual(['user:user-a', 'user:user-b']);
    expect(h.backend.users.get('user-b')?.points).toBe(25);
  });
});
