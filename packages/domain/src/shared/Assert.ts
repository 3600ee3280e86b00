type ErrorFactory = (message: string) => Error;

const defaultErrorFactory: ErrorFactory = (message) => new Error(message);

/**
 * Fluent assertion DSL for domain invariants.
 *
 * The optional error factory lets a caller raise its own error type
 * (e.g. `MalformedRequestError`) instead of a plain `Error`.
 *
 * @example
 * ```typescript
 * Assert.that(realmUrl, 'RealmUrl').isNonEmpty();
 * Assert.that(statusCode, 'StatusCode', (m) => new MalformedStatusError(m)).isInteger();
 * ```
 */
export class Assert<T> {
  private constructor(
    private readonly value: T,
    private readonly name: string | undefined,
    private readonly toError: ErrorFactory
  ) {}

  static that<T>(value: T, name?: string, toError: ErrorFactory = defaultErrorFactory): Assert<T> {
    return new Assert(value, name, toError);
  }

  // === String Assertions ===

  isNonEmpty(): this {
    if (typeof this.value !== 'string' || this.value.length === 0) {
      throw this.toError(this.formatError('must be a non-empty string', this.value));
    }
    return this;
  }

  matches(pattern: RegExp): this {
    if (typeof this.value !== 'string' || !pattern.test(this.value)) {
      throw this.toError(this.formatError(`must match pattern ${pattern}`, this.value));
    }
    return this;
  }

  // === Number Assertions ===

  isInteger(): this {
    if (typeof this.value !== 'number' || !Number.isInteger(this.value)) {
      throw this.toError(this.formatError('must be an integer', this.value));
    }
    return this;
  }

  // === Private Helpers ===

  private formatError(message: string, value: unknown): string {
    const prefix = this.name ? `${this.name} ` : 'Value ';
    const valueStr = value === undefined ? 'undefined' : value === null ? 'null' : JSON.stringify(value);
    return `${prefix}${message}, got: ${valueStr}`;
  }
}
