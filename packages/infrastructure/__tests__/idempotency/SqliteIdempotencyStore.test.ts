import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import type { Kysely } from 'kysely';
import { SqliteIdempotencyStore } from '../../src/idempotency/SqliteIdempotencyStore';
import type { PermitDatabase } from '../../src/persistence/database.types';
import { createTestDatabase } from '../fixtures/testDatabase';

describe('SqliteIdempotencyStore', () => {
  let db: Kysely<PermitDatabase>;

  beforeEach(async () => {
    vi.spyOn(console, 'info').mockImplementation(() => undefined);
    db = await createTestDatabase();
  });

  afterEach(async () => {
    await db.destroy();
    vi.restoreAllMocks();
  });

  const record = (key: string, aggregateId: string, createdAt = 10) => ({
    key,
    commandType: 'RequestUserPermissionChange',
    aggregateId,
    createdAt,
  });

  it('claims and reads idempotency keys', async () => {
    const store = new SqliteIdempotencyStore(db);

    expect(await store.claim(record('idem-1', 'change-1'))).toEqual(record('idem-1', 'change-1'));
    expect(await store.get('idem-1')).toEqual(record('idem-1', 'change-1'));
    expect(await store.get('idem-missing')).toBeNull();
  });

  it('returns the first claimant for a key that is already taken', async () => {
    const store = new SqliteIdempotencyStore(db);
    await store.claim(record('idem-2', 'change-1', 10));

    const second = await store.claim({
      key: 'idem-2',
      commandType: 'RequestMetadataPermissionChange',
      aggregateId: 'change-2',
      createdAt: 12,
    });

    expect(second).toEqual(record('idem-2', 'change-1', 10));
  });

  it('resolves concurrent claims to a single winner', async () => {
    const store = new SqliteIdempotencyStore(db);

    const [first, second] = await Promise.all([
      store.claim(record('idem-3', 'change-1')),
      store.claim(record('idem-3', 'change-2')),
    ]);

    expect(second).toEqual(first);
    expect(['change-1', 'change-2']).toContain(first.aggregateId);
    const rows = await db.selectFrom('idempotency_keys').selectAll().execute();
    expect(rows).toHaveLength(1);
  });

  it('releases a key only for the aggregate that holds it', async () => {
    const store = new SqliteIdempotencyStore(db);
    await store.claim(record('idem-4', 'change-1'));

    await store.release('idem-4', 'change-2');
    expect((await store.get('idem-4'))?.aggregateId).toBe('change-1');

    await store.release('idem-4', 'change-1');
    expect(await store.get('idem-4')).toBeNull();
  });
});
