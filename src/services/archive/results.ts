/**
 * Results returned by the archive service
 */

import { getErrorMessage } from '../../types/errors.js';

/** Why a call failed; the API answers each with its own status */
export type ArchiveFailureReason = 'invalid-request' | 'not-found' | 'upstream';

export interface ArchiveFailure {
  reason: ArchiveFailureReason;
  message: string;
  details?: unknown;
}

export type ArchiveResult<T> =
  | { success: true; data: T }
  | { success: false; error: ArchiveFailure };

export function succeeded<T>(data: T): ArchiveResult<T> {
  return { success: true, data };
}

export function failed<T>(error: ArchiveFailure): ArchiveResult<T> {
  return { success: false, error };
}

export function notFound<T>(message: string): ArchiveResult<T> {
  return failed({ reason: 'not-found', message });
}

export function invalidRequest<T>(
  message: string,
  details: unknown
): ArchiveResult<T> {
  return failed({ reason: 'invalid-request', message, details });
}

/**
 * Discord or Drive could not answer; the cause's message goes in the details
 */
export function upstreamFailure<T>(
  message: string,
  cause: unknown
): ArchiveResult<T> {
  return failed({
    reason: 'upstream',
    message,
    details: { error: getErrorMessage(cause) },
  });
}
