import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import type { Kysely } from 'kysely';
import { DuplicateRecordError, NotFoundError } from '@permit/application';
import { MalformedStatusError, PermissionChange, PermissionChangeId } from '@permit/domain';
import { SqlitePermissionChangeStore } from '../../src/permissions/SqlitePermissionChangeStore';
import type { PermitDatabase } from '../../src/persistence/database.types';
import { createTestDatabase } from '../fixtures/testDatabase';

const userChange = (userId = 'alice') =>
  PermissionChange.createForUser({ userId, realmUrl: '/shared/calendar', mayRead: true });

describe('SqlitePermissionChangeStore', () => {
  let db: Kysely<PermitDatabase>;

  beforeEach(async () => {
    vi.spyOn(console, 'info').mockImplementation(() => undefined);
    db = await createTestDatabase();
  });

  afterEach(async () => {
    await db.destroy();
    vi.restoreAllMocks();
  });

  it('stores a request and returns the same live instance', async () => {
    const store = new SqlitePermissionChangeStore(db);
    const change = userChange();

    await store.add(change);
    const found = await store.get(change.id);

    expect(found.kind).toBe('some');
    if (found.kind === 'some') {
      expect(found.value).toBe(change);
    }
  });

  it('rehydrates requests written by another store instance', async () => {
    const change = PermissionChange.createForMetadata({
      key: 'team',
      value: 'ops',
      realmUrl: '*',
      mayWrite: false,
    });
    await new SqlitePermissionChangeStore(db).add(change);

    const found = await new SqlitePermissionChangeStore(db).get(change.id);

    expect(found.kind).toBe('some');
    if (found.kind === 'some') {
      expect(found.value).not.toBe(change);
      expect(found.value.toSnapshot()).toEqual(change.toSnapshot());
      expect(found.value.userId).toBe('');
      expect(found.value.mayWrite).toBe('revoke');
      expect(found.value.mayRead).toBe('unspecified');
    }
  });

  it('returns none for unknown ids', async () => {
    const store = new SqlitePermissionChangeStore(db);
    const found = await store.get(PermissionChangeId.create());
    expect(found.kind).toBe('none');
  });

  it('rejects a second request with the same id', async () => {
    const change = userChange();
    await new SqlitePermissionChangeStore(db).add(change);

    const other = new SqlitePermissionChangeStore(db);
    await expect(other.add(change)).rejects.toBeInstanceOf(DuplicateRecordError);
  });

  it('lists pending and unsubmitted requests', async () => {
    const store = new SqlitePermissionChangeStore(db, () => 1_000);
    const first = userChange('alice');
    const second = userChange('bob');
    await store.add(first);
    await store.add(second);

    await store.markSubmitted([first.id]);
    await store.writeAuthorityStatus(second.id, { statusCode: 0, statusMessage: null });

    const pending = await store.listPending();
    const unsubmitted = await store.listUnsubmitted();
    expect(pending.map((c) => c.id.value)).toEqual([first.id.value]);
    expect(unsubmitted.map((c) => c.id.value)).toEqual([second.id.value]);

    const row = await db
      .selectFrom('permission_changes')
      .select('submitted_at')
      .where('id', '=', first.id.value)
      .executeTakeFirstOrThrow();
    expect(row.submitted_at).toBe(1_000);
  });

  it('lists submitted requests without a status as awaiting an outcome', async () => {
    const store = new SqlitePermissionChangeStore(db, () => 1_000);
    const decided = userChange('alice');
    const waiting = userChange('bob');
    const unsent = userChange('carol');
    for (const change of [decided, waiting, unsent]) await store.add(change);

    await store.markSubmitted([decided.id, waiting.id]);
    await store.writeAuthorityStatus(decided.id, { statusCode: 0, statusMessage: null });

    const awaiting = await store.listAwaitingOutcome();
    expect(awaiting.map((c) => c.id.value)).toEqual([waiting.id.value]);
  });

  it('honours the list limit', async () => {
    const store = new SqlitePermissionChangeStore(db);
    await store.add(userChange('alice'));
    await store.add(userChange('bob'));
    await store.add(userChange('carol'));

    expect(await store.listPending(2)).toHaveLength(2);
  });

  it('writes the authority status once and notifies subscribers', async () => {
    const store = new SqlitePermissionChangeStore(db);
    const change = userChange();
    await store.add(change);
    const listener = vi.fn();
    change.subscribe(listener);

    const first = await store.writeAuthorityStatus(change.id, { statusCode: 614, statusMessage: 'denied' });
    const repeat = await store.writeAuthorityStatus(change.id, { statusCode: 614, statusMessage: 'denied' });
    const conflict = await store.writeAuthorityStatus(change.id, { statusCode: 0, statusMessage: null });

    expect(first).toEqual({ kind: 'applied' });
    expect(repeat).toEqual({ kind: 'duplicate' });
    expect(conflict).toEqual({
      kind: 'conflict',
      recorded: { statusCode: 614, statusMessage: 'denied' },
      attempted: { statusCode: 0, statusMessage: null },
    });
    expect(listener).toHaveBeenCalledTimes(1);

    const row = await db
      .selectFrom('permission_changes')
      .select(['status_code', 'status_message'])
      .where('id', '=', change.id.value)
      .executeTakeFirstOrThrow();
    expect(row).toEqual({ status_code: 614, status_message: 'denied' });
  });

  it('catches up a live record when another connection wrote the status first', async () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const store = new SqlitePermissionChangeStore(db);
    const change = userChange();
    await store.add(change);

    await db
      .updateTable('permission_changes')
      .set({ status_code: 0, status_message: 'ok' })
      .where('id', '=', change.id.value)
      .execute();

    const result = await store.writeAuthorityStatus(change.id, { statusCode: 617, statusMessage: null });

    expect(change.statusCode).toBe(0);
    expect(result).toEqual({
      kind: 'conflict',
      recorded: { statusCode: 0, statusMessage: 'ok' },
      attempted: { statusCode: 617, statusMessage: null },
    });
    expect(warn).toHaveBeenCalledWith(
      '[PermissionChangeStore] terminal status was written by another connection',
      { id: change.id.value, statusCode: 0 }
    );
  });

  it('rejects non-integer status codes and unknown ids', async () => {
    const store = new SqlitePermissionChangeStore(db);
    const change = userChange();
    await store.add(change);

    await expect(
      store.writeAuthorityStatus(change.id, { statusCode: 1.5, statusMessage: null })
    ).rejects.toBeInstanceOf(MalformedStatusError);
    await expect(
      store.writeAuthorityStatus(PermissionChangeId.create(), { statusCode: 0, statusMessage: null })
    ).rejects.toBeInstanceOf(NotFoundError);
    expect(change.statusCode).toBeNull();
  });
});
