/**
 * Base class for immutable values compared by their underlying value.
 *
 * Concrete value objects expose the canonical representation through
 * `value` and keep persistence and transport concerns out of this layer.
 */
export abstract class ValueObject<TValue> {
  abstract get value(): TValue;

  equals(other: ValueObject<TValue>): boolean {
    return Object.is(this.value, other.value);
  }

  toString(): string {
    return String(this.value);
  }
}
