import type {
  AuthorityStatus,
  OutcomeWriteResult,
  PermissionChange,
  PermissionChangeId,
} from '@permit/domain';
import type { Option } from '../../shared/ports/Option';

/**
 * Object store holding permission change requests.
 *
 * Implementations hand back one live instance per id, so field-change
 * notifications raised by the authority write path reach every holder.
 */
export interface PermissionChangeStorePort {
  /**
   * Persist a newly constructed request.
   *
   * @throws {DuplicateRecordError} if a request with the same id is stored
   */
  add(change: PermissionChange): Promise<void>;

  get(id: PermissionChangeId): Promise<Option<PermissionChange>>;

  /** Requests the authority has not written a terminal status for. */
  listPending(limit?: number): Promise<PermissionChange[]>;

  /** Requests not yet accepted by the authority transport. */
  listUnsubmitted(limit?: number): Promise<PermissionChange[]>;

  /** Submitted requests still waiting for their terminal status, oldest first. */
  listAwaitingOutcome(limit?: number): Promise<PermissionChange[]>;

  markSubmitted(ids: readonly PermissionChangeId[]): Promise<void>;

  /**
   * Privileged write path for the authority's terminal status. Ordinary
   * callers never write status fields.
   *
   * @throws {NotFoundError} if no request with this id is stored
   */
  writeAuthorityStatus(
    id: PermissionChangeId,
    status: AuthorityStatus
  ): Promise<OutcomeWriteResult>;
}
