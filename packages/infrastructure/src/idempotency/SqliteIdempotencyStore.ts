import type { IdempotencyRecord, IdempotencyStorePort } from '@permit/application';
import type { Kysely } from 'kysely';
import { PersistenceError } from '../errors';
import type { PermitDatabase } from '../persistence/database.types';

export class SqliteIdempotencyStore implements IdempotencyStorePort {
  constructor(private readonly db: Kysely<PermitDatabase>) {}

  async get(key: string): Promise<IdempotencyRecord | null> {
    const row = await this.db
      .selectFrom('idempotency_keys')
      .select(['idempotency_key', 'command_type', 'aggregate_id', 'created_at'])
      .where('idempotency_key', '=', key)
      .executeTakeFirst();
    if (!row) return null;
    return {
      key: row.idempotency_key,
      commandType: row.command_type,
      aggregateId: row.aggregate_id,
      createdAt: row.created_at,
    };
  }

  async claim(record: IdempotencyRecord): Promise<IdempotencyRecord> {
    // The primary key decides the winner; the loser reads it back.
    await this.db
      .insertInto('idempotency_keys')
      .values({
        idempotency_key: record.key,
        command_type: record.commandType,
        aggregate_id: record.aggregateId,
        created_at: record.createdAt,
      })
      .onConflict((oc) => oc.column('idempotency_key').doNothing())
      .execute();

    const stored = await this.get(record.key);
    if (!stored) {
      throw new PersistenceError(`Idempotency key ${record.key} vanished after being claimed`);
    }
    return stored;
  }

  async release(key: string, aggregateId: string): Promise<void> {
    await this.db
      .deleteFrom('idempotency_keys')
      .where('idempotency_key', '=', key)
      .where('aggregate_id', '=', aggregateId)
      .execute();
  }
}
