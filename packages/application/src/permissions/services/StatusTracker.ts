import {
  FieldChangeNotifier,
  NotificationPhases,
  decodeStatus,
  isSameDecodedStatus,
  type DecodedStatus,
  type FieldChangeListener,
  type PermissionChange,
  type PermissionErrorCode,
  type ProcessingStatus,
  type SubscribeOptions,
  type Unsubscribe,
} from '@permit/domain';

export type DerivedStatusField = 'status' | 'errorCode';

/**
 * Keeps the decoded status of one request in step with its raw
 * `statusCode`.
 *
 * The tracker listens on the record in the `derive` phase, so by the time
 * any `observe`-phase listener of the same change runs, `current` already
 * matches the new code. Its own listeners are told which derived fields
 * changed.
 */
export class StatusTracker {
  private readonly notifier = new FieldChangeNotifier<DerivedStatusField>();
  private readonly unsubscribeFromRecord: Unsubscribe;
  private decoded: DecodedStatus;

  constructor(private readonly change: PermissionChange) {
    this.decoded = decodeStatus(change.statusCode);
    this.unsubscribeFromRecord = change.subscribe(() => this.recompute(), {
      phase: NotificationPhases.derive,
      fields: ['statusCode'],
    });
  }

  get current(): DecodedStatus {
    return this.decoded;
  }

  get status(): ProcessingStatus {
    return this.decoded.status;
  }

  get errorCode(): PermissionErrorCode | null {
    return this.decoded.errorCode;
  }

  get record(): PermissionChange {
    return this.change;
  }

  subscribe(
    listener: FieldChangeListener<DerivedStatusField>,
    options?: SubscribeOptions<DerivedStatusField>
  ): Unsubscribe {
    return this.notifier.subscribe(listener, options);
  }

  dispose(): void {
    this.unsubscribeFromRecord();
  }

  private recompute(): void {
    const next = decodeStatus(this.change.statusCode);
    if (isSameDecodedStatus(this.decoded, next)) return;

    const changed: DerivedStatusField[] = ['status'];
    if (this.decoded.errorCode !== null || next.errorCode !== null) {
      changed.push('errorCode');
    }
    this.decoded = next;
    this.notifier.notify(changed);
  }
}

export const trackStatus = (change: PermissionChange): StatusTracker => new StatusTracker(change);
