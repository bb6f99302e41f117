/**
 * Errors raised by the merchant API client.
 *
 * A call either resolves with the decoded body or rejects with exactly one
 * of these. Nothing is retried.
 */

/**
 * The API answered with a status outside 200-299
 */
export class RemoteApiError extends Error {
  constructor(
    public readonly status: number,
    public readonly payload: unknown,
    public readonly url: string,
  ) {
    super(`Merchant API error ${status} for ${url}`);
    this.name = 'RemoteApiError';
  }

  get isServerError(): boolean {
    return this.status >= 500;
  }
}

/**
 * No HTTP response was obtained (DNS, refused connection, TLS, timeout)
 */
export class TransportError extends Error {
  constructor(
    message: string,
    public readonly url: string,
    public readonly timedOut: boolean,
    cause?: unknown,
  ) {
    super(message, { cause });
    this.name = 'TransportError';
  }
}
