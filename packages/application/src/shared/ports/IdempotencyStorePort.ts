export type IdempotencyRecord = {
  key: string;
  commandType: string;
  aggregateId: string;
  createdAt: number;
};

/**
 * Remembers which record a command's idempotency key produced, so a
 * retried command returns the same request instead of creating another.
 */
export interface IdempotencyStorePort {
  get(key: string): Promise<IdempotencyRecord | null>;

  /**
   * Atomically bind `record.key` to `record.aggregateId` unless the key is
   * already bound. Resolves to the stored record: the given one when the
   * claim won, otherwise the earlier claimant's.
   */
  claim(record: IdempotencyRecord): Promise<IdempotencyRecord>;

  /** Drop the key, but only while it is still bound to `aggregateId`. */
  release(key: string, aggregateId: string): Promise<void>;
}
