import { Kysely, Migrator, type Migration, type MigrationProvider } from 'kysely';
import { PersistenceError } from '../errors';

const PERMISSION_CHANGE_MIGRATIONS: Record<string, Migration> = {
  '0001_permission_changes': {
    async up(db: Kysely<unknown>): Promise<void> {
      await db.schema
        .createTable('permission_changes')
        .addColumn('id', 'text', (col) => col.primaryKey())
        .addColumn('created_at', 'integer', (col) => col.notNull())
        .addColumn('updated_at', 'integer', (col) => col.notNull())
        .addColumn('status_code', 'integer')
        .addColumn('status_message', 'text')
        .addColumn('user_id', 'text', (col) => col.notNull())
        .addColumn('metadata_key', 'text')
        .addColumn('metadata_value', 'text')
        .addColumn('realm_url', 'text', (col) => col.notNull())
        .addColumn('may_read', 'text', (col) => col.notNull())
        .addColumn('may_write', 'text', (col) => col.notNull())
        .addColumn('may_manage', 'text', (col) => col.notNull())
        .addColumn('submitted_at', 'integer')
        .execute();

      await db.schema
        .createIndex('permission_changes_pending_idx')
        .on('permission_changes')
        .columns(['status_code', 'created_at'])
        .execute();
    },
    async down(db: Kysely<unknown>): Promise<void> {
      await db.schema.dropTable('permission_changes').ifExists().execute();
    },
  },
  '0002_idempotency_keys': {
    async up(db: Kysely<unknown>): Promise<void> {
      await db.schema
        .createTable('idempotency_keys')
        .addColumn('idempotency_key', 'text', (col) => col.primaryKey())
        .addColumn('command_type', 'text', (col) => col.notNull())
        .addColumn('aggregate_id', 'text', (col) => col.notNull())
        .addColumn('created_at', 'integer', (col) => col.notNull())
        .execute();
    },
    async down(db: Kysely<unknown>): Promise<void> {
      await db.schema.dropTable('idempotency_keys').ifExists().execute();
    },
  },
};

const provider: MigrationProvider = {
  getMigrations: async () => PERMISSION_CHANGE_MIGRATIONS,
};

export async function migrateToLatest<DB>(db: Kysely<DB>): Promise<void> {
  const migrator = new Migrator({ db, provider });
  const migrationResult = await migrator.migrateToLatest();

  migrationResult.results?.forEach((result) => {
    if (result.status === 'Success') {
      console.info(`[PermitMigrations] ${result.migrationName} applied`);
    } else if (result.status === 'Error') {
      console.error(`[PermitMigrations] ${result.migrationName} failed`);
    }
  });

  if (migrationResult.error) {
    throw new PersistenceError('Permission change migrations failed', {
      cause: migrationResult.error,
    });
  }
}
