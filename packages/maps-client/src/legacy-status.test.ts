import { describe, expect, it } from 'vitest';

import { checkLegacyStatus } from './legacy-status';

describe('checkLegacyStatus', () => {
  it('passes OK', () => {
    expect(checkLegacyStatus({ status: 'OK' })).toBeNull();
  });

  it('marks UNKNOWN_ERROR as retryable', () => {
    expect(checkLegacyStatus({ status: 'UNKNOWN_ERROR', error_message: 'Try again.' })).toEqual({
      apiStatus: 'UNKNOWN_ERROR',
      message: 'Try again.',
      retryable: true
    });
  });

  it('treats every other status as final', () => {
    for (const status of ['ZERO_RESULTS', 'OVER_QUERY_LIMIT', 'OVER_DAILY_LIMIT', 'REQUEST_DENIED', 'INVALID_REQUEST']) {
      expect(checkLegacyStatus({ status })).toEqual({ apiStatus: status, message: undefined, retryable: false });
    }
  });
});
