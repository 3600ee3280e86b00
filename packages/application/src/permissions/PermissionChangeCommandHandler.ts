import { PermissionChange, parsePermissionFlag } from '@permit/domain';
import type { RequestMetadataPermissionChange, RequestUserPermissionChange } from './commands';
import type { PermissionChangeStorePort } from './ports/PermissionChangeStorePort';
import type { IdempotencyStorePort } from '../shared/ports/IdempotencyStorePort';
import { BaseCommandHandler } from '../shared/ports/BaseCommandHandler';

export type PermissionChangeCommandResult = Readonly<{
  requestId: string;
  /** True when the idempotency key had already produced this request. */
  duplicate: boolean;
}>;

const requireNonEmpty = (value: string, field: string): string => {
  if (typeof value !== 'string' || value.length === 0) {
    throw new Error(`${field} must be a non-empty string`);
  }
  return value;
};

/**
 * Builds permission change requests from commands and persists them.
 *
 * Requests are constructed only after every field parsed cleanly, so a
 * malformed command never reaches the store. The idempotency key is
 * claimed before the request is stored, so concurrent commands sharing a
 * key resolve to the single request the winning claim created.
 */
export class PermissionChangeCommandHandler extends BaseCommandHandler {
  constructor(
    private readonly store: PermissionChangeStorePort,
    private readonly idempotencyStore: IdempotencyStorePort,
    private readonly now: () => number = Date.now
  ) {
    super();
  }

  async handleRequestForUser(command: RequestUserPermissionChange): Promise<PermissionChangeCommandResult> {
    const parsed = this.parseCommand(command.payload, {
      userId: (p) => requireNonEmpty(p.userId, 'userId'),
      realmUrl: (p) => requireNonEmpty(p.realmUrl, 'realmUrl'),
      mayRead: (p) => parsePermissionFlag(p.mayRead, 'mayRead'),
      mayWrite: (p) => parsePermissionFlag(p.mayWrite, 'mayWrite'),
      mayManage: (p) => parsePermissionFlag(p.mayManage, 'mayManage'),
      idempotencyKey: (p) => this.parseIdempotencyKey(p.idempotencyKey),
    });

    const change = PermissionChange.createForUser(parsed);
    return this.persist(change, parsed.idempotencyKey, command.type);
  }

  async handleRequestForMetadata(
    command: RequestMetadataPermissionChange
  ): Promise<PermissionChangeCommandResult> {
    const parsed = this.parseCommand(command.payload, {
      key: (p) => requireNonEmpty(p.metadataKey, 'metadataKey'),
      value: (p) => requireNonEmpty(p.metadataValue, 'metadataValue'),
      realmUrl: (p) => requireNonEmpty(p.realmUrl, 'realmUrl'),
      mayRead: (p) => parsePermissionFlag(p.mayRead, 'mayRead'),
      mayWrite: (p) => parsePermissionFlag(p.mayWrite, 'mayWrite'),
      mayManage: (p) => parsePermissionFlag(p.mayManage, 'mayManage'),
      idempotencyKey: (p) => this.parseIdempotencyKey(p.idempotencyKey),
    });

    const change = PermissionChange.createForMetadata(parsed);
    return this.persist(change, parsed.idempotencyKey, command.type);
  }

  private async persist(
    change: PermissionChange,
    idempotencyKey: string,
    commandType: string
  ): Promise<PermissionChangeCommandResult> {
    const claimed = await this.idempotencyStore.claim({
      key: idempotencyKey,
      commandType,
      aggregateId: change.id.value,
      createdAt: this.now(),
    });
    if (claimed.aggregateId !== change.id.value) {
      this.assertIdempotencyRecord({ existing: claimed, expectedCommandType: commandType });
      return { requestId: claimed.aggregateId, duplicate: true };
    }

    try {
      await this.store.add(change);
    } catch (error) {
      await this.releaseClaim(idempotencyKey, change.id.value);
      throw error;
    }
    return { requestId: change.id.value, duplicate: false };
  }

  private async releaseClaim(idempotencyKey: string, aggregateId: string): Promise<void> {
    try {
      await this.idempotencyStore.release(idempotencyKey, aggregateId);
    } catch (error) {
      console.error('[PermissionChangeCommandHandler] failed to release idempotency key', {
        idempotencyKey,
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }
}
