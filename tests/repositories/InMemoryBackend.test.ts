import { describe, it, expect, beforeEach } from 'vitest';
import { WriteConflictError } from '../../src/errors.js';
import { InMemoryBackend } from '../../src/repositories/InMemoryBackend.js';
import type { Changeset } from '../../src/repositories/ITransactionBackend.js';
import { isEmptyChangeset } from '../../src/repositories/ITransactionBackend.js';
import { makeUser } from '../helpers/fixtures.js';

function changeset(overrides: Partial<Changeset>): Changeset {
  return {
    insertedPartnerships: [],
    updatedPartnerships: [],
    updatedUsers: [],
    insertedInteractions: [],
    insertedGrants: [],
    updatedQuestions: [],
    insertedAnswers: [],
    updatedAnswers: [],
    ...overrides,
  };
}

const signal = new AbortController().signal;

describe('InMemoryBackend', () => {
  let backend: InMemoryBackend;

  beforeEach(() => {
    backend = new InMemoryBackend();
    backend.putUser(makeUser({ id: 'user-a' }));
  });

  it('should bump the version of updated rows', async () => {
    await backend.commit(changeset({ updatedUsers: [makeUser({ id: 'user-a', points: 5 })] }));
    expect(backend.users.get('user-a')).toMatchObject({ points: 5, version: 2 });
  });

  it('should reject a stale update and apply nothing', async () => {
    const grant = { id: 'g-1', userId: 'user-a', achievementType: 'first_answer', grantedAt: new Date() };
    const stale = changeset({
      updatedUsers: [makeUser({ id: 'user-a', points: 5, version: 7 })],
      insertedGrants: [grant],
    });

    await expect(backend.commit(stale)).rejects.toThrow(WriteConflictError);
    expect(backend.grants).toEqual([]);
    expect(backend.users.get('user-a')?.points).toBe(0);
    expect(backend.commits).toBe(0);
  });

  it('should reject a second grant of the same type', async () => {
    const grant = { id: 'g-1', userId: 'user-a', achievementType: 'first_answer', grantedAt: new Date() };
    await backend.commit(changeset({ insertedGrants: [grant] }));

    await expect(
      backend.commit(changeset({ insertedGrants: [{ ...grant, id: 'g-2' }] }))
    ).rejects.toThrow('user_achievements (user-a:first_answer) already exists');
  });

  it('should reject an update of a row that no longer exists', async () => {
    await expect(
      backend.commit(changeset({ updatedUsers: [makeUser({ id: 'ghost' })] }))
    ).rejects.toThrow('users/ghost no longer exists');
  });

  it('should return copies from reads', async () => {
    const user = await backend.reader(signal).userById('user-a');
    if (!user) throw new Error('seed missing');
    user.points = 99;
    expect(backend.users.get('user-a')?.points).toBe(0);
  });

  it('should recognise an empty changeset', () => {
    expect(isEmptyChangeset(changeset({}))).toBe(true);
    expect(isEmptyChangeset(changeset({ updatedUsers: [makeUser({ id: 'user-a' })] }))).toBe(false);
  });
});
