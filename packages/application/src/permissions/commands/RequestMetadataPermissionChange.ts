import type { PermissionFlagInput } from '@permit/domain';
import { BaseCommand } from '../../shared/ports/BaseCommand';

export type RequestMetadataPermissionChangePayload = {
  metadataKey: string;
  metadataValue: string;
  realmUrl: string;
  mayRead?: PermissionFlagInput;
  mayWrite?: PermissionFlagInput;
  mayManage?: PermissionFlagInput;
  idempotencyKey: string;
};

export class RequestMetadataPermissionChange extends BaseCommand<RequestMetadataPermissionChangePayload> {
  readonly type = 'RequestMetadataPermissionChange';

  constructor(payload: RequestMetadataPermissionChangePayload) {
    super(payload);
  }
}
