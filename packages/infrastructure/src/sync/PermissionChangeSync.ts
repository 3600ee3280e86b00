import type { AuthorityTransportPort, PermissionChangeStorePort } from '@permit/application';
import {
  decodeStatus,
  describeDirectives,
  describeOutcome,
  describeTarget,
  type AuthorityStatus,
  type OutcomeWriteResult,
  type PermissionChange,
} from '@permit/domain';
import { AuthorityTransportError } from '../authority/HttpAuthorityTransport';
import { PersistenceError } from '../errors';
import {
  SyncDirections,
  SyncErrorCodes,
  SyncStatusKinds,
  type PermissionChangeSyncOptions,
  type PullResult,
  type PushResult,
  type SyncDirection,
  type SyncError,
  type SyncStatus,
} from './types';

const DEFAULT_INTERVAL_MS = 2_000;
const DEFAULT_PUSH_BATCH_SIZE = 50;
const DEFAULT_PULL_BATCH_SIZE = 100;
const MIN_BACKOFF_MS = 1_000;
const MAX_BACKOFF_MS = 30_000;

const applyJitter = (value: number): number => {
  const jitterRatio = 0.5 + Math.random();
  return Math.round(value * jitterRatio);
};

const nextBackoffMs = (current: number, min: number, max: number): number => {
  const base = current === 0 ? min : Math.min(current * 2, max);
  const jittered = applyJitter(base);
  return Math.min(Math.max(jittered, min), max);
};

const toSyncError = (error: unknown, direction: SyncDirection): SyncError => {
  const message = error instanceof Error ? error.message : String(error);
  if (error instanceof AuthorityTransportError) {
    return {
      code: error.status === undefined ? SyncErrorCodes.network : SyncErrorCodes.server,
      message,
      context: { direction, status: error.status },
    };
  }
  if (error instanceof PersistenceError) {
    return { code: SyncErrorCodes.storage, message, context: { direction } };
  }
  return { code: SyncErrorCodes.unknown, message, context: { direction } };
};

/**
 * Moves requests between the local store and the authority.
 *
 * Push hands unsubmitted requests to the transport; pull asks for the
 * outcome of every pending request and records terminal ones through the
 * store's authority write path, which is what notifies subscribers.
 */
export class PermissionChangeSync {
  private readonly store: PermissionChangeStorePort;
  private readonly transport: AuthorityTransportPort;
  private readonly intervalMs: number;
  private readonly pushBatchSize: number;
  private readonly pullBatchSize: number;
  private readonly minBackoffMs: number;
  private readonly maxBackoffMs: number;
  private readonly onStatusChange?: (status: SyncStatus) => void;
  private readonly now: () => number;
  private running = false;
  private timer: ReturnType<typeof setTimeout> | null = null;
  private inFlight: Promise<void> | null = null;
  private backoffMs = 0;
  private status: SyncStatus = {
    kind: SyncStatusKinds.idle,
    lastSuccessAt: null,
    lastError: null,
  };

  constructor(options: PermissionChangeSyncOptions) {
    this.store = options.store;
    this.transport = options.transport;
    this.intervalMs = options.intervalMs ?? DEFAULT_INTERVAL_MS;
    this.pushBatchSize = options.pushBatchSize ?? DEFAULT_PUSH_BATCH_SIZE;
    this.pullBatchSize = options.pullBatchSize ?? DEFAULT_PULL_BATCH_SIZE;
    this.minBackoffMs = options.minBackoffMs ?? MIN_BACKOFF_MS;
    this.maxBackoffMs = options.maxBackoffMs ?? MAX_BACKOFF_MS;
    this.onStatusChange = options.onStatusChange;
    this.now = options.now ?? Date.now;
  }

  start(): void {
    if (this.running) return;
    this.running = true;
    this.schedule(0);
  }

  /** Stops scheduling and waits for a round already in flight. */
  async stop(): Promise<void> {
    this.running = false;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    await this.inFlight;
  }

  get isRunning(): boolean {
    return this.running;
  }

  getStatus(): SyncStatus {
    return this.status;
  }

  async syncOnce(): Promise<void> {
    await this.runDirection(SyncDirections.push, () => this.pushOnce());
    await this.runDirection(SyncDirections.pull, () => this.pullOnce());
    this.setStatus({ kind: SyncStatusKinds.idle, lastSuccessAt: this.now(), lastError: null });
  }

  async pushOnce(): Promise<PushResult> {
    const unsubmitted = await this.store.listUnsubmitted(this.pushBatchSize);
    if (unsubmitted.length === 0) return { submitted: 0, accepted: 0 };

    const acceptedIds = new Set(await this.transport.submit(unsubmitted));
    const accepted = unsubmitted.filter((change) => acceptedIds.has(change.id.value));
    await this.store.markSubmitted(accepted.map((change) => change.id));

    if (accepted.length < unsubmitted.length) {
      console.warn('[PermissionSync] authority accepted only part of the batch', {
        submitted: unsubmitted.length,
        accepted: accepted.length,
      });
    }
    return { submitted: unsubmitted.length, accepted: accepted.length };
  }

  async pullOnce(): Promise<PullResult> {
    const pending = await this.store.listAwaitingOutcome(this.pullBatchSize);
    if (pending.length === 0) {
      return { applied: 0, duplicates: 0, conflicts: 0, stillPending: 0 };
    }

    const byId = new Map<string, PermissionChange>(pending.map((change) => [change.id.value, change]));
    const outcomes = await this.transport.fetchOutcomes([...byId.keys()]);

    let applied = 0;
    let duplicates = 0;
    let conflicts = 0;
    for (const outcome of outcomes) {
      if (outcome.statusCode === null) continue;
      const change = byId.get(outcome.id);
      if (!change) {
        console.warn('[PermissionSync] outcome for unknown permission change ignored', { id: outcome.id });
        continue;
      }
      const status = { statusCode: outcome.statusCode, statusMessage: outcome.statusMessage };
      const result = await this.writeOutcome(change, status);
      switch (result.kind) {
        case 'applied':
          applied += 1;
          console.info('[PermissionSync] permission change processed', {
            id: outcome.id,
            target: describeTarget(change.target),
            directives: describeDirectives(change.flags),
            outcome: describeOutcome(decodeStatus(status.statusCode), status.statusMessage),
          });
          break;
        case 'duplicate':
          duplicates += 1;
          break;
        case 'conflict':
          conflicts += 1;
          console.warn('[PermissionSync] conflicting terminal status ignored', {
            id: outcome.id,
            recorded: result.recorded,
            attempted: result.attempted,
          });
          break;
      }
    }

    const stillPending = pending.filter((change) => !change.isTerminal).length;
    return { applied, duplicates, conflicts, stillPending };
  }

  /**
   * A subscriber that throws must not cost the rest of the batch once the
   * status itself has been recorded.
   */
  private async writeOutcome(change: PermissionChange, status: AuthorityStatus): Promise<OutcomeWriteResult> {
    const wasTerminal = change.isTerminal;
    try {
      return await this.store.writeAuthorityStatus(change.id, status);
    } catch (error) {
      if (wasTerminal || !change.isTerminal) throw error;
      console.error('[PermissionSync] listener failed after status was recorded', {
        id: change.id.value,
        error: error instanceof Error ? error.message : String(error),
      });
      return { kind: 'applied' };
    }
  }

  private async runDirection<T>(direction: SyncDirection, run: () => Promise<T>): Promise<T> {
    this.setStatus({
      kind: SyncStatusKinds.syncing,
      direction,
      lastSuccessAt: this.status.lastSuccessAt,
      lastError: this.status.kind === SyncStatusKinds.error ? this.status.error : this.status.lastError,
    });
    try {
      return await run();
    } catch (error) {
      const syncError = toSyncError(error, direction);
      this.setStatus({
        kind: SyncStatusKinds.error,
        error: syncError,
        retryAt: null,
        lastSuccessAt: this.status.lastSuccessAt,
      });
      throw error;
    }
  }

  private schedule(delayMs: number): void {
    if (!this.running) return;
    this.timer = setTimeout(() => {
      this.timer = null;
      this.inFlight = this.tick().finally(() => {
        this.inFlight = null;
      });
    }, delayMs);
  }

  private async tick(): Promise<void> {
    try {
      await this.syncOnce();
      this.backoffMs = 0;
      this.schedule(this.intervalMs);
    } catch (error) {
      this.backoffMs = nextBackoffMs(this.backoffMs, this.minBackoffMs, this.maxBackoffMs);
      console.error('[PermissionSync] sync round failed', {
        error: error instanceof Error ? error.message : String(error),
        retryInMs: this.backoffMs,
      });
      if (this.status.kind === SyncStatusKinds.error) {
        this.setStatus({ ...this.status, retryAt: this.now() + this.backoffMs });
      }
      this.schedule(this.backoffMs);
    }
  }

  private setStatus(status: SyncStatus): void {
    this.status = status;
    this.onStatusChange?.(status);
  }
}
