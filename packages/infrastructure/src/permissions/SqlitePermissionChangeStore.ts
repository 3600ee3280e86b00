import {
  DuplicateRecordError,
  NotFoundError,
  none,
  some,
  type Option,
  type PermissionChangeStorePort,
} from '@permit/application';
import {
  MalformedStatusError,
  PermissionChange,
  PermissionChangeId,
  type AuthorityStatus,
  type OutcomeWriteResult,
} from '@permit/domain';
import type { Kysely, Selectable } from 'kysely';
import type { PermissionChangesTable, PermitDatabase } from '../persistence/database.types';
import { PersistenceError } from '../errors';

type PermissionChangeRow = Selectable<PermissionChangesTable>;

const DEFAULT_LIST_LIMIT = 100;

const isPrimaryKeyViolation = (error: unknown): boolean =>
  error instanceof Error &&
  'code' in error &&
  (error.code === 'SQLITE_CONSTRAINT_PRIMARYKEY' || error.code === 'SQLITE_CONSTRAINT_UNIQUE');

const toRow = (change: PermissionChange): PermissionChangeRow => {
  const snapshot = change.toSnapshot();
  return {
    id: snapshot.id,
    created_at: snapshot.createdAt,
    updated_at: snapshot.updatedAt,
    status_code: snapshot.statusCode,
    status_message: snapshot.statusMessage,
    user_id: snapshot.userId,
    metadata_key: snapshot.metadataKey,
    metadata_value: snapshot.metadataValue,
    realm_url: snapshot.realmUrl,
    may_read: snapshot.mayRead,
    may_write: snapshot.mayWrite,
    may_manage: snapshot.mayManage,
    submitted_at: null,
  };
};

const fromRow = (row: PermissionChangeRow): PermissionChange =>
  PermissionChange.rehydrate({
    id: row.id,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
    statusCode: row.status_code,
    statusMessage: row.status_message,
    userId: row.user_id,
    metadataKey: row.metadata_key,
    metadataValue: row.metadata_value,
    realmUrl: row.realm_url,
    mayRead: row.may_read,
    mayWrite: row.may_write,
    mayManage: row.may_manage,
  });

/**
 * SQLite-backed request store.
 *
 * Keeps an identity map of live records: every caller asking for the same
 * id gets the same instance, so status notifications raised here reach all
 * of them. The authority write only touches rows whose `status_code` is
 * still NULL, so a stored terminal status is never overwritten.
 */
export class SqlitePermissionChangeStore implements PermissionChangeStorePort {
  private readonly live = new Map<string, PermissionChange>();

  constructor(
    private readonly db: Kysely<PermitDatabase>,
    private readonly now: () => number = Date.now
  ) {}

  async add(change: PermissionChange): Promise<void> {
    if (this.live.has(change.id.value)) {
      throw new DuplicateRecordError(change.id.value);
    }
    try {
      await this.db.insertInto('permission_changes').values(toRow(change)).execute();
    } catch (error) {
      if (isPrimaryKeyViolation(error)) {
        throw new DuplicateRecordError(change.id.value);
      }
      throw new PersistenceError(`Failed to store permission change ${change.id.value}`, { cause: error });
    }
    this.live.set(change.id.value, change);
  }

  async get(id: PermissionChangeId): Promise<Option<PermissionChange>> {
    const cached = this.live.get(id.value);
    if (cached) return some(cached);

    const row = await this.db
      .selectFrom('permission_changes')
      .selectAll()
      .where('id', '=', id.value)
      .executeTakeFirst();
    return row ? some(this.track(row)) : none();
  }

  async listPending(limit = DEFAULT_LIST_LIMIT): Promise<PermissionChange[]> {
    const rows = await this.db
      .selectFrom('permission_changes')
      .selectAll()
      .where('status_code', 'is', null)
      .orderBy('created_at', 'asc')
      .limit(limit)
      .execute();
    return rows.map((row) => this.track(row));
  }

  async listUnsubmitted(limit = DEFAULT_LIST_LIMIT): Promise<PermissionChange[]> {
    const rows = await this.db
      .selectFrom('permission_changes')
      .selectAll()
      .where('submitted_at', 'is', null)
      .orderBy('created_at', 'asc')
      .limit(limit)
      .execute();
    return rows.map((row) => this.track(row));
  }

  async listAwaitingOutcome(limit = DEFAULT_LIST_LIMIT): Promise<PermissionChange[]> {
    const rows = await this.db
      .selectFrom('permission_changes')
      .selectAll()
      .where('status_code', 'is', null)
      .where('submitted_at', 'is not', null)
      .orderBy('created_at', 'asc')
      .limit(limit)
      .execute();
    return rows.map((row) => this.track(row));
  }

  async markSubmitted(ids: readonly PermissionChangeId[]): Promise<void> {
    if (ids.length === 0) return;
    await this.db
      .updateTable('permission_changes')
      .set({ submitted_at: this.now() })
      .where(
        'id',
        'in',
        ids.map((id) => id.value)
      )
      .where('submitted_at', 'is', null)
      .execute();
  }

  async writeAuthorityStatus(id: PermissionChangeId, status: AuthorityStatus): Promise<OutcomeWriteResult> {
    if (!Number.isInteger(status.statusCode)) {
      throw new MalformedStatusError(`StatusCode must be an integer, got: ${JSON.stringify(status.statusCode)}`);
    }
    const found = await this.get(id);
    if (found.kind === 'none') {
      throw new NotFoundError(`Permission change ${id.value} not found`);
    }
    const change = found.value;

    const result = await this.db
      .updateTable('permission_changes')
      .set({ status_code: status.statusCode, status_message: status.statusMessage })
      .where('id', '=', id.value)
      .where('status_code', 'is', null)
      .executeTakeFirst();

    if (Number(result.numUpdatedRows) === 0 && !change.isTerminal) {
      // Another connection recorded the status first; catch the live record up.
      const stored = await this.db
        .selectFrom('permission_changes')
        .select(['status_code', 'status_message'])
        .where('id', '=', id.value)
        .executeTakeFirstOrThrow();
      if (stored.status_code !== null) {
        console.warn('[PermissionChangeStore] terminal status was written by another connection', {
          id: id.value,
          statusCode: stored.status_code,
        });
        change.recordOutcome({ statusCode: stored.status_code, statusMessage: stored.status_message });
      }
    }

    return change.recordOutcome(status);
  }

  private track(row: PermissionChangeRow): PermissionChange {
    const cached = this.live.get(row.id);
    if (cached) return cached;
    const change = fromRow(row);
    this.live.set(row.id, change);
    return change;
  }
}
