/**
 * Chat identity has no enrolled API credential
 */
export class NotAuthorizedError extends Error {
  constructor(public readonly identity: string) {
    super(`No API credential enrolled for identity ${identity}`);
    this.name = 'NotAuthorizedError';
  }
}

/**
 * Locally rejected input; always correctable by the sender
 */
export class InputValidationError extends Error {
  constructor(
    public readonly field: string,
    public readonly reason: string,
  ) {
    super(`Invalid ${field}: ${reason}`);
    this.name = 'InputValidationError';
  }
}

/**
 * Webhook request without the expected shared secret
 */
export class WebhookAuthError extends Error {
  constructor(reason: string) {
    super(reason);
    this.name = 'WebhookAuthError';
  }
}
