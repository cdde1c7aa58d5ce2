import { z } from 'zod';

import type { ApplicationFailure } from './errors';

/**
 * Top-level `status` field shared by the legacy web service APIs.
 */
export const LegacyStatusSchema = z.object({
  status: z.string(),
  error_message: z.string().optional()
});

export type LegacyStatusBody = z.infer<typeof LegacyStatusSchema>;

/**
 * `OK` passes. `UNKNOWN_ERROR` is the one status Google documents as worth retrying.
 */
export const checkLegacyStatus = (body: LegacyStatusBody): ApplicationFailure | null => {
  if (body.status === 'OK') {
    return null;
  }

  return {
    apiStatus: body.status,
    message: body.error_message,
    retryable: body.status === 'UNKNOWN_ERROR'
  };
};
