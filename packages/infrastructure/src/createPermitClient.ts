import {
  PermissionChangeCommandHandler,
  type AuthorityTransportPort,
} from '@permit/application';
import type { Kysely } from 'kysely';
import { HttpAuthorityTransport } from './authority/HttpAuthorityTransport';
import type { PermitConfig } from './config';
import { SqliteIdempotencyStore } from './idempotency/SqliteIdempotencyStore';
import { SqlitePermissionChangeStore } from './permissions/SqlitePermissionChangeStore';
import { createPermitDatabase } from './persistence/database';
import type { PermitDatabase } from './persistence/database.types';
import { migrateToLatest } from './persistence/migrations';
import { PermissionChangeSync } from './sync/PermissionChangeSync';
import type { SyncStatus } from './sync/types';

export type PermitClient = Readonly<{
  db: Kysely<PermitDatabase>;
  store: SqlitePermissionChangeStore;
  commands: PermissionChangeCommandHandler;
  sync: PermissionChangeSync;
  close: () => Promise<void>;
}>;

export type CreatePermitClientOptions = Readonly<{
  config: PermitConfig;
  /** Replaces the HTTP transport, e.g. with an in-process authority. */
  transport?: AuthorityTransportPort;
  fetchImpl?: typeof fetch;
  onSyncStatusChange?: (status: SyncStatus) => void;
}>;

export const createPermitClient = async (options: CreatePermitClientOptions): Promise<PermitClient> => {
  const { config } = options;
  const db = createPermitDatabase(config.dbPath);
  try {
    await migrateToLatest(db);
  } catch (error) {
    await db.destroy();
    throw error;
  }

  const store = new SqlitePermissionChangeStore(db);
  const commands = new PermissionChangeCommandHandler(store, new SqliteIdempotencyStore(db));
  const transport =
    options.transport ??
    new HttpAuthorityTransport({
      baseUrl: config.authorityUrl,
      fetchImpl: options.fetchImpl,
      timeoutMs: config.requestTimeoutMs,
    });
  const sync = new PermissionChangeSync({
    store,
    transport,
    intervalMs: config.syncIntervalMs,
    pushBatchSize: config.pushBatchSize,
    pullBatchSize: config.pullBatchSize,
    onStatusChange: options.onSyncStatusChange,
  });

  console.info('[PermitClient] ready', { dbPath: config.dbPath, authorityUrl: config.authorityUrl });

  return {
    db,
    store,
    commands,
    sync,
    close: async () => {
      await sync.stop();
      await db.destroy();
    },
  };
};
