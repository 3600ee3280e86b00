/**
 * Base for commands: a typed, immutable payload tagged with its type.
 */
export abstract class BaseCommand<TPayload extends object> {
  abstract readonly type: string;

  protected constructor(readonly payload: Readonly<TPayload>) {}
}
