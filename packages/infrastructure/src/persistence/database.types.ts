import type { PermissionDirective } from '@permit/domain';

export interface PermissionChangesTable {
  id: string;
  created_at: number;
  updated_at: number;
  status_code: number | null;
  status_message: string | null;
  user_id: string;
  metadata_key: string | null;
  metadata_value: string | null;
  realm_url: string;
  may_read: PermissionDirective;
  may_write: PermissionDirective;
  may_manage: PermissionDirective;
  submitted_at: number | null;
}

export interface IdempotencyKeysTable {
  idempotency_key: string;
  command_type: string;
  aggregate_id: string;
  created_at: number;
}

export interface PermitDatabase {
  permission_changes: PermissionChangesTable;
  idempotency_keys: IdempotencyKeysTable;
}
