import type { ValidationError } from './CommandResult';
import { ValidationException } from '../../errors/ValidationError';
import type { IdempotencyRecord } from './IdempotencyStorePort';

type FieldParser<TCommand, TResult> = (command: TCommand) => TResult;

type ParsedFromSpec<
  TCommand,
  TSpec extends Record<string, FieldParser<TCommand, unknown>>,
> = {
  [TKey in keyof TSpec]: TSpec[TKey] extends FieldParser<
    TCommand,
    infer TResult
  >
    ? TResult
    : never;
};

const MAX_IDEMPOTENCY_KEY_LENGTH = 200;

/**
 * Base class for command handlers that turn primitive payloads into
 * domain values while collecting every field error before failing.
 */
export abstract class BaseCommandHandler {
  /**
   * Parse a command according to a field specification.
   *
   * Each parser converts one field; a throwing parser is recorded against
   * its field and parsing continues, so the resulting ValidationException
   * lists every invalid field at once.
   */
  protected parseCommand<
    TCommand,
    TSpec extends Record<string, FieldParser<TCommand, unknown>>,
  >(command: TCommand, spec: TSpec): ParsedFromSpec<TCommand, TSpec> {
    const errors: ValidationError[] = [];
    const result: Partial<ParsedFromSpec<TCommand, TSpec>> = {};

    (Object.keys(spec) as Array<keyof TSpec>).forEach((field) => {
      const parser = spec[field];
      try {
        const value = parser(command);
        (result as ParsedFromSpec<TCommand, TSpec>)[field] =
          value as ParsedFromSpec<TCommand, TSpec>[typeof field];
      } catch (error) {
        const message =
          error instanceof Error ? error.message : 'Invalid value';
        errors.push({ field: String(field), message });
      }
    });

    if (errors.length > 0) {
      throw new ValidationException(errors);
    }

    return result as ParsedFromSpec<TCommand, TSpec>;
  }

  protected parseIdempotencyKey(key: string): string {
    if (typeof key !== 'string' || key.trim().length === 0) {
      throw new Error('idempotencyKey must be a non-empty string');
    }
    if (key.length > MAX_IDEMPOTENCY_KEY_LENGTH) {
      throw new Error(
        `idempotencyKey must be at most ${MAX_IDEMPOTENCY_KEY_LENGTH} characters`
      );
    }
    return key;
  }

  protected assertIdempotencyRecord(params: {
    existing: IdempotencyRecord;
    expectedCommandType: string;
  }): void {
    const { existing, expectedCommandType } = params;
    if (existing.commandType !== expectedCommandType) {
      throw new Error(
        `Idempotency key reuse detected for ${existing.key} (existing ${existing.commandType}/${existing.aggregateId}, new ${expectedCommandType})`
      );
    }
  }
}
