export type Unsubscribe = () => void;

export const NotificationPhases = {
  derive: 'derive',
  observe: 'observe',
} as const;

export type NotificationPhase =
  (typeof NotificationPhases)[keyof typeof NotificationPhases];

export type FieldChange<TField extends string> = Readonly<{
  fields: ReadonlySet<TField>;
}>;

export type FieldChangeListener<TField extends string> = (
  change: FieldChange<TField>
) => void;

export type SubscribeOptions<TField extends string> = Readonly<{
  /** Defaults to `observe`. */
  phase?: NotificationPhase;
  /** Only notify when at least one of these fields changed. */
  fields?: readonly TField[];
}>;

type Registration<TField extends string> = Readonly<{
  listener: FieldChangeListener<TField>;
  fields: ReadonlySet<TField> | null;
}>;

const PHASE_ORDER: readonly NotificationPhase[] = [
  NotificationPhases.derive,
  NotificationPhases.observe,
];

/**
 * Field-level change notification for a single record.
 *
 * Every notification carries the full set of fields changed in one batch.
 * All `derive` listeners run before any `observe` listener of the same
 * batch, so views recomputed from raw fields are fresh by the time
 * ordinary observers read them.
 *
 * A throwing listener does not stop the batch; errors are rethrown once
 * every listener has run.
 */
export class FieldChangeNotifier<TField extends string> {
  private readonly registrations = new Map<
    NotificationPhase,
    Registration<TField>[]
  >();

  subscribe(
    listener: FieldChangeListener<TField>,
    options: SubscribeOptions<TField> = {}
  ): Unsubscribe {
    const phase = options.phase ?? NotificationPhases.observe;
    const registration: Registration<TField> = {
      listener,
      fields: options.fields ? new Set(options.fields) : null,
    };
    const existing = this.registrations.get(phase) ?? [];
    existing.push(registration);
    this.registrations.set(phase, existing);

    return () => {
      const current = this.registrations.get(phase) ?? [];
      this.registrations.set(
        phase,
        current.filter((entry) => entry !== registration)
      );
    };
  }

  notify(fields: readonly TField[]): void {
    if (fields.length === 0) return;
    const change: FieldChange<TField> = { fields: new Set(fields) };
    const errors: unknown[] = [];

    for (const phase of PHASE_ORDER) {
      const snapshot = [...(this.registrations.get(phase) ?? [])];
      for (const { listener, fields: filter } of snapshot) {
        if (filter && !fields.some((field) => filter.has(field))) continue;
        try {
          listener(change);
        } catch (error) {
          errors.push(error);
        }
      }
    }

    if (errors.length === 1) {
      throw errors[0];
    }
    if (errors.length > 1) {
      throw new AggregateError(errors, 'Multiple change listeners threw');
    }
  }

  get listenerCount(): number {
    let count = 0;
    this.registrations.forEach((entries) => {
      count += entries.length;
    });
    return count;
  }
}
