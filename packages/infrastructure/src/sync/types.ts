import type { AuthorityTransportPort, PermissionChangeStorePort } from '@permit/application';

export const SyncDirections = {
  pull: 'pull',
  push: 'push',
} as const;

export type SyncDirection = (typeof SyncDirections)[keyof typeof SyncDirections];

export const SyncErrorCodes = {
  network: 'network',
  server: 'server',
  storage: 'storage',
  unknown: 'unknown',
} as const;

export type SyncErrorCode = (typeof SyncErrorCodes)[keyof typeof SyncErrorCodes];

export const SyncStatusKinds = {
  idle: 'idle',
  syncing: 'syncing',
  error: 'error',
} as const;

export type SyncStatusKind = (typeof SyncStatusKinds)[keyof typeof SyncStatusKinds];

export type SyncError = Readonly<{
  code: SyncErrorCode;
  message: string;
  context?: Readonly<Record<string, unknown>>;
}>;

export type SyncStatus =
  | Readonly<{
      kind: typeof SyncStatusKinds.idle;
      lastSuccessAt: number | null;
      lastError: SyncError | null;
    }>
  | Readonly<{
      kind: typeof SyncStatusKinds.syncing;
      direction: SyncDirection;
      lastSuccessAt: number | null;
      lastError: SyncError | null;
    }>
  | Readonly<{
      kind: typeof SyncStatusKinds.error;
      error: SyncError;
      retryAt: number | null;
      lastSuccessAt: number | null;
    }>;

export type PushResult = Readonly<{
  submitted: number;
  accepted: number;
}>;

export type PullResult = Readonly<{
  applied: number;
  duplicates: number;
  conflicts: number;
  stillPending: number;
}>;

export type PermissionChangeSyncOptions = Readonly<{
  store: PermissionChangeStorePort;
  transport: AuthorityTransportPort;
  intervalMs?: number;
  pushBatchSize?: number;
  pullBatchSize?: number;
  minBackoffMs?: number;
  maxBackoffMs?: number;
  onStatusChange?: (status: SyncStatus) => void;
  now?: () => number;
}>;
