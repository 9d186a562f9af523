import { describe, it, expect, beforeEach } from 'vitest';
import { InMemoryQuestionCache } from '../../src/stores/InMemoryQuestionCache.js';
import { dailyQuestionKey } from '../../src/stores/IQuestionCache.js';
import { makeQuestion } from '../helpers/fixtures.js';

describe('InMemoryQuestionCache', () => {
  let now: number;
  let cache: InMemoryQuestionCache;

  beforeEach(() => {
    now = 1_000;
    cache = new InMemoryQuestionCache(() => now);
  });

  it('should return a stored question until it expires', async () => {
    await cache.put('k', makeQuestion({ id: 'q1' }), 500);

    now = 1_499;
    expect((await cache.get('k'))?.id).toBe('q1');

    now = 1_500;
    expect(await cache.get('k')).toBeNull();
    expect(cache.size).toBe(0);
  });

  it('should sweep expired keys of earlier days on put', async () => {
    const day = 24 * 60 * 60 * 1000;
    for (let i = 1; i <= 30; i++) {
      now = 1_000 + i * day;
      await cache.put(dailyQuestionKey('user-a', `2026-03-${String(i).padStart(2, '0')}`), makeQuestion({ id: 'q1' }), 1_000);
    }

    expect(cache.size).toBe(1);
    expect((await cache.get('daily:user-a:2026-03-30'))?.id).toBe('q1');
  });

  it('should keep unexpired entries when sweeping', async () => {
    await cache.put('a', makeQuestion({ id: 'q1' }), 500);
    await cache.put('b', makeQuestion({ id: 'q2' }), 2_000);

    now = 1_600;
    await cache.put('c', makeQuestion({ id: 'q3' }), 500);

    expect(cache.size).toBe(2);
    expect((await cache.get('b'))?.id).toBe('q2');
  });

  it('should hand out copies', async () => {
    await cache.put('k', makeQuestion({ id: 'q1' }), 500);

    const first = await cache.get('k');
    if (!first) throw new Error('expected a cached question');
    first.content = 'changed';

    expect((await cache.get('k'))?.content).toBe('Question q1?');
  });

  it('should forget a deleted key', async () => {
    await cache.put('k', makeQuestion({ id: 'q1' }), 500);
    await cache.delete('k');

    expect(await cache.get('k')).toBeNull();
  });

  it('should key daily picks by user and day', () => {
    expect(dailyQuestionKey('user-a', '2026-03-02')).toBe('daily:user-a:2026-03-02');
  });
});
