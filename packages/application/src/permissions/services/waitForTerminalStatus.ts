import {
  NotificationPhases,
  ProcessingStatuses,
  decodeStatus,
  type DecodedStatus,
  type PermissionChange,
} from '@permit/domain';

export type WaitForTerminalStatusOptions = Readonly<{
  signal?: AbortSignal;
  timeoutMs?: number;
}>;

const abortError = (message: string): Error => {
  const error = new Error(message);
  error.name = 'AbortError';
  return error;
};

/**
 * Resolve once the authority has written a terminal status into `change`.
 *
 * Driven by the record's change notifications; nothing is polled.
 * Rejects with an `AbortError` when the signal aborts or the timeout
 * elapses first.
 */
export const waitForTerminalStatus = (
  change: PermissionChange,
  options: WaitForTerminalStatusOptions = {}
): Promise<DecodedStatus> => {
  const initial = decodeStatus(change.statusCode);
  if (initial.status !== ProcessingStatuses.notProcessed) {
    return Promise.resolve(initial);
  }
  if (options.signal?.aborted) {
    return Promise.reject(abortError('Waiting for permission change status was aborted'));
  }

  return new Promise<DecodedStatus>((resolve, reject) => {
    let timer: ReturnType<typeof setTimeout> | null = null;

    const cleanup = () => {
      unsubscribe();
      options.signal?.removeEventListener('abort', onAbort);
      if (timer) {
        clearTimeout(timer);
        timer = null;
      }
    };

    const onAbort = () => {
      cleanup();
      reject(abortError('Waiting for permission change status was aborted'));
    };

    const unsubscribe = change.subscribe(
      () => {
        const decoded = decodeStatus(change.statusCode);
        if (decoded.status === ProcessingStatuses.notProcessed) return;
        cleanup();
        resolve(decoded);
      },
      { phase: NotificationPhases.observe, fields: ['statusCode'] }
    );

    options.signal?.addEventListener('abort', onAbort, { once: true });
    if (typeof options.timeoutMs === 'number') {
      timer = setTimeout(() => {
        cleanup();
        reject(abortError(`Permission change ${change.id.value} not processed within ${options.timeoutMs}ms`));
      }, options.timeoutMs);
    }
  });
};
