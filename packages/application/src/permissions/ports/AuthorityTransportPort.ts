import type { PermissionChange } from '@permit/domain';

/**
 * What the authority currently reports for one request. `statusCode` is
 * null while the request is still being evaluated.
 */
export type AuthorityOutcome = Readonly<{
  id: string;
  statusCode: number | null;
  statusMessage: string | null;
}>;

/**
 * Moves requests to the authority and brings its status writes back.
 * Delivery is at least once; applying the same outcome twice is harmless.
 */
export interface AuthorityTransportPort {
  /** Returns the ids the authority accepted. */
  submit(changes: readonly PermissionChange[]): Promise<string[]>;
  fetchOutcomes(ids: readonly string[]): Promise<AuthorityOutcome[]>;
}
