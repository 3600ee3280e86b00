import SQLite from 'better-sqlite3';
import { Kysely, SqliteDialect } from 'kysely';
import type { PermitDatabase } from './database.types';

/**
 * Open the local request database. `:memory:` keeps everything in process.
 */
export const createPermitDatabase = (path: string): Kysely<PermitDatabase> =>
  new Kysely<PermitDatabase>({
    dialect: new SqliteDialect({
      database: new SQLite(path),
    }),
  });
