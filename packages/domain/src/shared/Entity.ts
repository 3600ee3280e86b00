import type { ValueObject } from './vos/ValueObject';

/**
 * Base class for entities.
 *
 * Entities are distinguished by their identifier, not their attributes:
 * two records carrying the same id are the same record.
 */
export abstract class Entity<TId extends ValueObject<string>> {
  protected constructor(private readonly _id: TId) {}

  get id(): TId {
    return this._id;
  }

  equals(other: Entity<TId>): boolean {
    if (!(other instanceof Entity)) {
      return false;
    }
    return this._id.equals(other._id);
  }
}
