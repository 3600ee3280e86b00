import { Assert } from '../shared/Assert';
import { Entity } from '../shared/Entity';
import {
  FieldChangeNotifier,
  type FieldChangeListener,
  type SubscribeOptions,
  type Unsubscribe,
} from '../shared/FieldChangeNotifier';
import { Timestamp } from '../shared/vos/Timestamp';
import { MalformedRequestError, MalformedStatusError } from './errors';
import {
  PERMISSION_CAPABILITIES,
  PermissionDirectives,
  parsePermissionFlag,
  type PermissionDirective,
  type PermissionFlagInput,
  type PermissionRequestFlags,
} from './PermissionDirective';
import { TargetKinds, type PermissionTarget } from './PermissionTarget';
import { PermissionChangeId } from './vos/PermissionChangeId';

export type PermissionChangeField =
  | 'id'
  | 'createdAt'
  | 'updatedAt'
  | 'statusCode'
  | 'statusMessage'
  | 'userId'
  | 'metadataKey'
  | 'metadataValue'
  | 'realmUrl'
  | 'mayRead'
  | 'mayWrite'
  | 'mayManage';

/** Persisted shape of a request; what stores write and read back. */
export type PermissionChangeSnapshot = Readonly<{
  id: string;
  createdAt: number;
  updatedAt: number;
  statusCode: number | null;
  statusMessage: string | null;
  userId: string;
  metadataKey: string | null;
  metadataValue: string | null;
  realmUrl: string;
  mayRead: PermissionDirective;
  mayWrite: PermissionDirective;
  mayManage: PermissionDirective;
}>;

export type PermissionFlagsInput = Readonly<{
  mayRead?: PermissionFlagInput;
  mayWrite?: PermissionFlagInput;
  mayManage?: PermissionFlagInput;
}>;

export type AuthorityStatus = Readonly<{
  statusCode: number;
  statusMessage: string | null;
}>;

export type OutcomeWriteResult =
  | Readonly<{ kind: 'applied' }>
  | Readonly<{ kind: 'duplicate' }>
  | Readonly<{ kind: 'conflict'; recorded: AuthorityStatus; attempted: AuthorityStatus }>;

const malformed = (message: string): Error => new MalformedRequestError(message);

const toFlags = (input: PermissionFlagsInput): PermissionRequestFlags => ({
  mayRead: parsePermissionFlag(input.mayRead, 'mayRead'),
  mayWrite: parsePermissionFlag(input.mayWrite, 'mayWrite'),
  mayManage: parsePermissionFlag(input.mayManage, 'mayManage'),
});

const targetFromSnapshot = (snapshot: PermissionChangeSnapshot): PermissionTarget => {
  const hasUser = snapshot.userId.length > 0;
  const hasMetadata = snapshot.metadataKey !== null || snapshot.metadataValue !== null;

  if (hasUser && hasMetadata) {
    throw new MalformedRequestError('A request must target either a user or a metadata pair, not both');
  }
  if (hasUser) {
    return { kind: TargetKinds.user, userId: snapshot.userId };
  }
  if (!hasMetadata) {
    throw new MalformedRequestError('A request must target a user (or * for all users) or a metadata pair');
  }
  Assert.that(snapshot.metadataKey, 'MetadataKey', malformed).isNonEmpty();
  Assert.that(snapshot.metadataValue, 'MetadataValue', malformed).isNonEmpty();
  return {
    kind: TargetKinds.metadata,
    key: snapshot.metadataKey ?? '',
    value: snapshot.metadataValue ?? '',
  };
};

/**
 * A request to change permissions of one or more users on one or more
 * realms.
 *
 * Created exclusively by the requesting side and processed asynchronously
 * by the authority, which writes `statusCode` / `statusMessage` back into
 * the same record. Capabilities left `unspecified` are merged with the
 * existing or default permissions during processing, which materializes
 * those defaults for the affected realm and users.
 *
 * Invariants enforced:
 * - Exactly one targeting mode (user XOR metadata pair)
 * - RealmUrl is non-empty (`*` for all realms)
 * - The status moves from unprocessed to terminal at most once; later
 *   writes never overwrite it
 *
 * @example
 * ```typescript
 * const change = PermissionChange.createForUser({
 *   userId: 'alice',
 *   realmUrl: '/shared/calendar',
 *   mayRead: true,
 * });
 *
 * change.subscribe(({ fields }) => {
 *   if (fields.has('statusCode')) render(change.statusCode);
 * });
 * ```
 */
export class PermissionChange extends Entity<PermissionChangeId> {
  private readonly notifier = new FieldChangeNotifier<PermissionChangeField>();
  private _statusCode: number | null;
  private _statusMessage: string | null;

  private constructor(
    id: PermissionChangeId,
    private readonly _target: PermissionTarget,
    private readonly _realmUrl: string,
    private readonly _flags: PermissionRequestFlags,
    private readonly _createdAt: Timestamp,
    private readonly _updatedAt: Timestamp,
    status: { statusCode: number | null; statusMessage: string | null }
  ) {
    super(id);
    Assert.that(_realmUrl, 'RealmUrl', malformed).isNonEmpty();
    this._statusCode = status.statusCode;
    this._statusMessage = status.statusMessage;
  }

  /**
   * Request a change for one user, or for every user with `userId: '*'`.
   */
  static createForUser(
    params: { userId: string; realmUrl: string } & PermissionFlagsInput
  ): PermissionChange {
    Assert.that(params.userId, 'UserId', malformed).isNonEmpty();
    return PermissionChange.createNew({ kind: TargetKinds.user, userId: params.userId }, params);
  }

  /**
   * Request a change for every user whose metadata matches `key` = `value`.
   * The stored `userId` is the empty string, distinct from `*`.
   */
  static createForMetadata(
    params: { key: string; value: string; realmUrl: string } & PermissionFlagsInput
  ): PermissionChange {
    Assert.that(params.key, 'MetadataKey', malformed).isNonEmpty();
    Assert.that(params.value, 'MetadataValue', malformed).isNonEmpty();
    return PermissionChange.createNew(
      { kind: TargetKinds.metadata, key: params.key, value: params.value },
      params
    );
  }

  /**
   * Rebuild a request read back from storage or the wire.
   */
  static rehydrate(snapshot: PermissionChangeSnapshot): PermissionChange {
    if (snapshot.statusCode !== null) {
      Assert.that(snapshot.statusCode, 'StatusCode', (m) => new MalformedStatusError(m)).isInteger();
    }
    return new PermissionChange(
      PermissionChangeId.from(snapshot.id),
      targetFromSnapshot(snapshot),
      snapshot.realmUrl,
      toFlags(snapshot),
      Timestamp.fromMillis(snapshot.createdAt),
      Timestamp.fromMillis(snapshot.updatedAt),
      { statusCode: snapshot.statusCode, statusMessage: snapshot.statusMessage }
    );
  }

  private static createNew(
    target: PermissionTarget,
    params: { realmUrl: string } & PermissionFlagsInput
  ): PermissionChange {
    const now = Timestamp.now();
    return new PermissionChange(PermissionChangeId.create(), target, params.realmUrl, toFlags(params), now, now, {
      statusCode: null,
      statusMessage: null,
    });
  }

  // === Getters ===

  get target(): PermissionTarget {
    return this._target;
  }

  /** The targeted user, `*` for all users, or `''` in metadata mode. */
  get userId(): string {
    return this._target.kind === TargetKinds.user ? this._target.userId : '';
  }

  get metadataKey(): string | null {
    return this._target.kind === TargetKinds.metadata ? this._target.key : null;
  }

  get metadataValue(): string | null {
    return this._target.kind === TargetKinds.metadata ? this._target.value : null;
  }

  get realmUrl(): string {
    return this._realmUrl;
  }

  get mayRead(): PermissionDirective {
    return this._flags.mayRead;
  }

  get mayWrite(): PermissionDirective {
    return this._flags.mayWrite;
  }

  get mayManage(): PermissionDirective {
    return this._flags.mayManage;
  }

  get flags(): PermissionRequestFlags {
    return this._flags;
  }

  get createdAt(): Timestamp {
    return this._createdAt;
  }

  /** Set once at construction; terminal status writes leave it untouched. */
  get updatedAt(): Timestamp {
    return this._updatedAt;
  }

  get statusCode(): number | null {
    return this._statusCode;
  }

  get statusMessage(): string | null {
    return this._statusMessage;
  }

  get isTerminal(): boolean {
    return this._statusCode !== null;
  }

  get hasUnspecifiedFlags(): boolean {
    return PERMISSION_CAPABILITIES.some((capability) => this._flags[capability] === PermissionDirectives.unspecified);
  }

  // === Notifications ===

  subscribe(
    listener: FieldChangeListener<PermissionChangeField>,
    options?: SubscribeOptions<PermissionChangeField>
  ): Unsubscribe {
    return this.notifier.subscribe(listener, options);
  }

  // === Authority write path ===

  /**
   * Record the authority's terminal status.
   *
   * Only the store's privileged writer calls this. The first write is
   * applied and notified; repeating it is a silent no-op; a different
   * terminal value is reported as a conflict and not applied.
   *
   * @throws {MalformedStatusError} if `statusCode` is not an integer
   */
  recordOutcome(status: AuthorityStatus): OutcomeWriteResult {
    Assert.that(status.statusCode, 'StatusCode', (m) => new MalformedStatusError(m)).isInteger();

    if (this._statusCode === null) {
      this._statusCode = status.statusCode;
      this._statusMessage = status.statusMessage;
      this.notifier.notify(['statusCode', 'statusMessage']);
      return { kind: 'applied' };
    }

    if (this._statusCode === status.statusCode && this._statusMessage === status.statusMessage) {
      return { kind: 'duplicate' };
    }

    return {
      kind: 'conflict',
      recorded: { statusCode: this._statusCode, statusMessage: this._statusMessage },
      attempted: status,
    };
  }

  toSnapshot(): PermissionChangeSnapshot {
    return {
      id: this.id.value,
      createdAt: this._createdAt.value,
      updatedAt: this._updatedAt.value,
      statusCode: this._statusCode,
      statusMessage: this._statusMessage,
      userId: this.userId,
      metadataKey: this.metadataKey,
      metadataValue: this.metadataValue,
      realmUrl: this._realmUrl,
      mayRead: this._flags.mayRead,
      mayWrite: this._flags.mayWrite,
      mayManage: this._flags.mayManage,
    };
  }
}
