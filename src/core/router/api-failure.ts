import { RemoteApiError, TransportError } from '../errors';
import { Messages } from '../presentation';

export type ApiFailure = RemoteApiError | TransportError;

export function isApiFailure(error: unknown): error is ApiFailure {
  return error instanceof RemoteApiError || error instanceof TransportError;
}

/**
 * Operator-facing text for a failed API call.
 *
 * Transport failures and 5xx answers are reported as a temporary outage;
 * other statuses echo the status and payload.
 */
export function describeApiFailure(error: ApiFailure): string {
  if (error instanceof TransportError || error.isServerError) {
    return Messages.serviceUnavailable;
  }
  return Messages.requestFailed(error.status, error.payload);
}
