import { Assert } from '../../shared/Assert';
import { ValueObject } from '../../shared/vos/ValueObject';
import { uuidv4 } from '../../utils/uuid';
import { MalformedRequestError } from '../errors';

const UUID_REGEX = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;

/**
 * Identity of a permission change request.
 *
 * Generated on the requesting side at construction time and never
 * reassigned; the store enforces uniqueness.
 *
 * @example
 * ```typescript
 * const id = PermissionChangeId.create();
 * const parsed = PermissionChangeId.from('123e4567-e89b-42d3-a456-426614174000');
 * ```
 */
export class PermissionChangeId extends ValueObject<string> {
  private constructor(private readonly _value: string) {
    super();
    Assert.that(_value, 'PermissionChangeId', (m) => new MalformedRequestError(m)).matches(UUID_REGEX);
  }

  static create(): PermissionChangeId {
    return new PermissionChangeId(uuidv4());
  }

  static from(value: string): PermissionChangeId {
    return new PermissionChangeId(value);
  }

  get value(): string {
    return this._value;
  }
}
