import type {
  AuthorityStatus,
  OutcomeWriteResult,
  PermissionChange,
  PermissionChangeId,
} from '@permit/domain';
import { DuplicateRecordError } from '../../../errors/DuplicateRecordError';
import { NotFoundError } from '../../../errors/NotFoundError';
import { fromNullable, type Option } from '../../../shared/ports/Option';
import type { PermissionChangeStorePort } from '../PermissionChangeStorePort';

/**
 * Process-local request store, kept in insertion order. Useful for tests
 * and for clients that do not persist requests across restarts.
 */
export class InMemoryPermissionChangeStore implements PermissionChangeStorePort {
  private readonly records = new Map<string, PermissionChange>();
  private readonly submitted = new Set<string>();
  private errorToThrow: Error | null = null;

  async add(change: PermissionChange): Promise<void> {
    if (this.errorToThrow) {
      const error = this.errorToThrow;
      this.errorToThrow = null;
      throw error;
    }
    if (this.records.has(change.id.value)) {
      throw new DuplicateRecordError(change.id.value);
    }
    this.records.set(change.id.value, change);
  }

  async get(id: PermissionChangeId): Promise<Option<PermissionChange>> {
    return fromNullable(this.records.get(id.value));
  }

  async listPending(limit?: number): Promise<PermissionChange[]> {
    return this.take((change) => !change.isTerminal, limit);
  }

  async listUnsubmitted(limit?: number): Promise<PermissionChange[]> {
    return this.take((change) => !this.submitted.has(change.id.value), limit);
  }

  async listAwaitingOutcome(limit?: number): Promise<PermissionChange[]> {
    return this.take((change) => !change.isTerminal && this.submitted.has(change.id.value), limit);
  }

  async markSubmitted(ids: readonly PermissionChangeId[]): Promise<void> {
    ids.forEach((id) => {
      if (this.records.has(id.value)) this.submitted.add(id.value);
    });
  }

  async writeAuthorityStatus(id: PermissionChangeId, status: AuthorityStatus): Promise<OutcomeWriteResult> {
    const change = this.records.get(id.value);
    if (!change) {
      throw new NotFoundError(`Permission change ${id.value} not found`);
    }
    return change.recordOutcome(status);
  }

  /** Make the next `add` reject with `error`. */
  failNextAdd(error: Error): void {
    this.errorToThrow = error;
  }

  get size(): number {
    return this.records.size;
  }

  private take(predicate: (change: PermissionChange) => boolean, limit?: number): PermissionChange[] {
    const matches = [...this.records.values()].filter(predicate);
    return typeof limit === 'number' ? matches.slice(0, limit) : matches;
  }
}
