import type { PermissionFlagInput } from '@permit/domain';
import { BaseCommand } from '../../shared/ports/BaseCommand';

export type RequestUserPermissionChangePayload = {
  userId: string;
  realmUrl: string;
  mayRead?: PermissionFlagInput;
  mayWrite?: PermissionFlagInput;
  mayManage?: PermissionFlagInput;
  idempotencyKey: string;
};

export class RequestUserPermissionChange extends BaseCommand<RequestUserPermissionChangePayload> {
  readonly type = 'RequestUserPermissionChange';

  constructor(payload: RequestUserPermissionChangePayload) {
    super(payload);
  }
}
