import { describe, expect, it } from 'vitest';
import { decodeStatus, isSameDecodedStatus } from '../../src/status/decodeStatus';
import { ERROR_TAXONOMY_VERSION, knownErrorCodes, lookupErrorCode } from '../../src/status/errorTaxonomy';
import { describeOutcome, toRequestOutcome } from '../../src/status/RequestOutcome';

describe('decodeStatus', () => {
  it('decodes absence as not processed', () => {
    expect(decodeStatus(null)).toEqual({ status: 'notProcessed', errorCode: null });
    expect(decodeStatus(undefined)).toEqual({ status: 'notProcessed', errorCode: null });
  });

  it('decodes zero as success', () => {
    expect(decodeStatus(0)).toEqual({ status: 'success', errorCode: null });
  });

  it('decodes a known code into its named kind', () => {
    expect(decodeStatus(614)).toEqual({
      status: 'error',
      errorCode: { kind: 'known', code: 614, name: 'access_denied', category: 'permission_denied' },
    });
  });

  it('keeps an unrecognized code verbatim', () => {
    expect(decodeStatus(619)).toEqual({
      status: 'error',
      errorCode: { kind: 'unknown', code: 619 },
    });
  });

  it('is total over known, zero, negative and very large codes', () => {
    const sample = [...knownErrorCodes(), 0, -1, 619, 2_147_483_647, Number.MAX_SAFE_INTEGER];
    for (const code of sample) {
      expect(() => decodeStatus(code)).not.toThrow();
      expect(decodeStatus(code).status).toBe(code === 0 ? 'success' : 'error');
    }
  });

  it('compares decoded values structurally', () => {
    expect(isSameDecodedStatus(decodeStatus(619), decodeStatus(619))).toBe(true);
    expect(isSameDecodedStatus(decodeStatus(619), decodeStatus(618))).toBe(false);
    expect(isSameDecodedStatus(decodeStatus(null), decodeStatus(0))).toBe(false);
    expect(isSameDecodedStatus(decodeStatus(0), decodeStatus(0))).toBe(true);
  });
});

describe('error taxonomy', () => {
  it('is versioned', () => {
    expect(ERROR_TAXONOMY_VERSION).toBe(1);
  });

  it('covers the permission denied, not found and malformed request categories', () => {
    expect(lookupErrorCode(206)).toMatchObject({ kind: 'known', category: 'permission_denied' });
    expect(lookupErrorCode(617)).toMatchObject({ kind: 'known', name: 'realm_not_found', category: 'not_found' });
    expect(lookupErrorCode(601)).toMatchObject({ kind: 'known', category: 'malformed_request' });
  });
});

describe('RequestOutcome', () => {
  it('maps decoded statuses onto outcomes', () => {
    expect(toRequestOutcome(decodeStatus(null))).toEqual({ kind: 'unprocessed' });
    expect(toRequestOutcome(decodeStatus(0))).toEqual({ kind: 'success' });
    expect(toRequestOutcome(decodeStatus(618))).toEqual({
      kind: 'known_server_error',
      code: 618,
      name: 'user_not_found',
      category: 'not_found',
    });
    expect(toRequestOutcome(decodeStatus(619))).toEqual({ kind: 'unknown_server_error', rawCode: 619 });
  });

  it('describes outcomes in one line', () => {
    expect(describeOutcome(decodeStatus(null), null)).toBe('pending');
    expect(describeOutcome(decodeStatus(0), 'ok')).toBe('succeeded: ok');
    expect(describeOutcome(decodeStatus(614), 'nope')).toBe('failed with access_denied (614): nope');
    expect(describeOutcome(decodeStatus(619), null)).toBe('failed with unrecognized code 619');
  });
});
