import { ProcessingStatuses, type DecodedStatus } from './decodeStatus';
import type { KnownErrorName, PermissionErrorCategory } from './errorTaxonomy';

/**
 * Client-observable outcome of a request. Authority rejections are data,
 * never exceptions; unknown codes keep the raw value for diagnostics.
 */
export type RequestOutcome =
  | Readonly<{ kind: 'unprocessed' }>
  | Readonly<{ kind: 'success' }>
  | Readonly<{
      kind: 'known_server_error';
      code: number;
      name: KnownErrorName;
      category: PermissionErrorCategory;
    }>
  | Readonly<{ kind: 'unknown_server_error'; rawCode: number }>;

export const toRequestOutcome = (decoded: DecodedStatus): RequestOutcome => {
  switch (decoded.status) {
    case ProcessingStatuses.notProcessed:
      return { kind: 'unprocessed' };
    case ProcessingStatuses.success:
      return { kind: 'success' };
    case ProcessingStatuses.error:
      return decoded.errorCode.kind === 'known'
        ? {
            kind: 'known_server_error',
            code: decoded.errorCode.code,
            name: decoded.errorCode.name,
            category: decoded.errorCode.category,
          }
        : { kind: 'unknown_server_error', rawCode: decoded.errorCode.code };
  }
};

export const describeOutcome = (decoded: DecodedStatus, statusMessage: string | null): string => {
  const outcome = toRequestOutcome(decoded);
  const suffix = statusMessage ? `: ${statusMessage}` : '';
  switch (outcome.kind) {
    case 'unprocessed':
      return 'pending';
    case 'success':
      return `succeeded${suffix}`;
    case 'known_server_error':
      return `failed with ${outcome.name} (${outcome.code})${suffix}`;
    case 'unknown_server_error':
      return `failed with unrecognized code ${outcome.rawCode}${suffix}`;
  }
};
