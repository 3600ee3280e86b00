import { lookupErrorCode, type PermissionErrorCode } from './errorTaxonomy';

export const ProcessingStatuses = {
  notProcessed: 'notProcessed',
  success: 'success',
  error: 'error',
} as const;

export type ProcessingStatus =
  (typeof ProcessingStatuses)[keyof typeof ProcessingStatuses];

export type DecodedStatus =
  | Readonly<{ status: typeof ProcessingStatuses.notProcessed; errorCode: null }>
  | Readonly<{ status: typeof ProcessingStatuses.success; errorCode: null }>
  | Readonly<{ status: typeof ProcessingStatuses.error; errorCode: PermissionErrorCode }>;

const NOT_PROCESSED: DecodedStatus = { status: ProcessingStatuses.notProcessed, errorCode: null };
const SUCCESS: DecodedStatus = { status: ProcessingStatuses.success, errorCode: null };

/**
 * Classify the raw status written by the authority. Pure and total:
 * every integer (and absence) decodes to a value.
 */
export const decodeStatus = (statusCode: number | null | undefined): DecodedStatus => {
  if (statusCode === null || statusCode === undefined) {
    return NOT_PROCESSED;
  }
  if (statusCode === 0) {
    return SUCCESS;
  }
  return { status: ProcessingStatuses.error, errorCode: lookupErrorCode(statusCode) };
};

export const isSameDecodedStatus = (a: DecodedStatus, b: DecodedStatus): boolean => {
  if (a.status !== b.status) return false;
  if (a.errorCode === null || b.errorCode === null) return a.errorCode === b.errorCode;
  return a.errorCode.kind === b.errorCode.kind && a.errorCode.code === b.errorCode.code;
};
