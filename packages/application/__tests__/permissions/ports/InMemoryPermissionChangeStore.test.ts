import { describe, expect, it } from 'vitest';
import { PermissionChange, PermissionChangeId } from '@permit/domain';
import { DuplicateRecordError } from '../../../src/errors/DuplicateRecordError';
import { NotFoundError } from '../../../src/errors/NotFoundError';
import { InMemoryPermissionChangeStore } from '../../../src/permissions/ports/mocks/InMemoryPermissionChangeStore';

const userChange = (userId: string) =>
  PermissionChange.createForUser({ userId, realmUrl: '*', mayManage: 'grant' });

describe('InMemoryPermissionChangeStore', () => {
  it('keeps insertion order and applies limits', async () => {
    const store = new InMemoryPermissionChangeStore();
    const changes = [userChange('a'), userChange('b'), userChange('c')];
    for (const change of changes) await store.add(change);

    const pending = await store.listPending(2);

    expect(pending).toEqual([changes[0], changes[1]]);
    expect(store.size).toBe(3);
  });

  it('rejects duplicates', async () => {
    const store = new InMemoryPermissionChangeStore();
    const change = userChange('a');
    await store.add(change);
    await expect(store.add(change)).rejects.toBeInstanceOf(DuplicateRecordError);
  });

  it('tracks submission separately from processing', async () => {
    const store = new InMemoryPermissionChangeStore();
    const first = userChange('a');
    const second = userChange('b');
    await store.add(first);
    await store.add(second);

    await store.markSubmitted([first.id, PermissionChangeId.create()]);
    await store.writeAuthorityStatus(first.id, { statusCode: 0, statusMessage: null });

    expect(await store.listUnsubmitted()).toEqual([second]);
    expect(await store.listPending()).toEqual([second]);
  });

  it('lists only submitted requests as awaiting an outcome', async () => {
    const store = new InMemoryPermissionChangeStore();
    const decided = userChange('a');
    const waiting = userChange('b');
    const unsent = userChange('c');
    for (const change of [decided, waiting, unsent]) await store.add(change);

    await store.markSubmitted([decided.id, waiting.id]);
    await store.writeAuthorityStatus(decided.id, { statusCode: 0, statusMessage: null });

    expect(await store.listAwaitingOutcome()).toEqual([waiting]);
  });

  it('fails the next add once when told to', async () => {
    const store = new InMemoryPermissionChangeStore();
    store.failNextAdd(new Error('disk full'));

    await expect(store.add(userChange('a'))).rejects.toThrow('disk full');
    await store.add(userChange('b'));
    expect(store.size).toBe(1);
  });

  it('throws NotFoundError when writing status for an unknown id', async () => {
    const store = new InMemoryPermissionChangeStore();
    await expect(
      store.writeAuthorityStatus(PermissionChangeId.create(), { statusCode: 0, statusMessage: null })
    ).rejects.toBeInstanceOf(NotFoundError);
  });
});
