import { timingSafeEqual } from 'crypto';
import { Logger } from '@nestjs/common';
import { plainToInstance } from 'class-transformer';
import { ValidationError, validateSync } from 'class-validator';
import { v4 as uuidv4 } from 'uuid';
import { DEPOSIT_NOTIFICATION_KIND, DepositNotificationDto } from '../../_shared/dto';
import { NotificationEvent, isRecord } from '../domain/models';
import { InputValidationError, WebhookAuthError } from '../errors';
import { DepositNotifier } from '../notifications';

export const WEBHOOK_SECRET_HEADER = 'x-api-key';

export type WebhookHeaders = Record<string, string | string[] | undefined>;

export interface WebhookRequest {
  headers: WebhookHeaders;
  /**
   * Raw bytes or text as received, or a body already decoded by the HTTP layer
   */
  body: unknown;
}

export interface WebhookResponse {
  status: number;
  body: string;
}

export const WEBHOOK_RESPONSES = {
  success: { status: 200, body: 'Success' },
  unauthorized: { status: 403, body: 'Unauthorized' },
  error: { status: 400, body: 'Error' },
} as const satisfies Record<string, WebhookResponse>;

export interface WebhookIngressOptions {
  secret: string;
  notifier: DepositNotifier;
}

/**
 * Webhook Ingress
 *
 * 1. Parse - body must be JSON
 * 2. Authenticate - shared secret header, constant-time comparison
 * 3. Route - only new_deposit is acted on, other kinds are accepted
 * 4. Validate - DepositNotificationDto
 * 5. Fan out - DepositNotifier, awaited before responding
 *
 * Response bodies are constant; the reason for a rejection is only logged.
 */
export class WebhookIngress {
  private readonly logger = new Logger(WebhookIngress.name);
  private readonly secret: Buffer;
  private readonly notifier: DepositNotifier;

  constructor(options: WebhookIngressOptions) {
    if (!options.secret) {
      throw new Error('Webhook secret must not be empty');
    }
    this.secret = Buffer.from(options.secret, 'utf8');
    this.notifier = options.notifier;
  }

  async handle(request: WebhookRequest): Promise<WebhookResponse> {
    const deliveryId = uuidv4();

    try {
      const payload = this.parseBody(request.body);
      this.authenticate(this.normalizeHeaders(request.headers));

      if (!isRecord(payload)) {
        throw new InputValidationError('body', 'expected a JSON object');
      }

      if (payload.message !== DEPOSIT_NOTIFICATION_KIND) {
        this.logger.log(
          `[${deliveryId}] Ignoring webhook event ${JSON.stringify(payload.message)}`,
        );
        return WEBHOOK_RESPONSES.success;
      }

      const event = this.toNotificationEvent(payload);
      const result = await this.notifier.notify(event);

      this.logger.log(
        `[${deliveryId}] Deposit to ${event.address} relayed to ${result.delivered.length}/${result.recipients} chats`,
      );
      return WEBHOOK_RESPONSES.success;
    } catch (error) {
      if (error instanceof WebhookAuthError) {
        this.logger.warn(`[${deliveryId}] Rejected webhook: ${error.message}`);
        return WEBHOOK_RESPONSES.unauthorized;
      }

      if (error instanceof InputValidationError) {
        this.logger.warn(`[${deliveryId}] Malformed webhook: ${error.message}`);
        return WEBHOOK_RESPONSES.error;
      }

      this.logger.error(
        `[${deliveryId}] Webhook processing error: ${error instanceof Error ? error.message : String(error)}`,
        error instanceof Error ? error.stack : undefined,
      );
      return WEBHOOK_RESPONSES.error;
    }
  }

  private parseBody(body: unknown): unknown {
    if (body === undefined || body === null) {
      throw new InputValidationError('body', 'missing');
    }

    if (!Buffer.isBuffer(body) && typeof body !== 'string') {
      return body;
    }

    const text = Buffer.isBuffer(body) ? body.toString('utf8') : body;
    try {
      return JSON.parse(text);
    } catch (error) {
      throw new InputValidationError(
        'body',
        error instanceof Error ? error.message : 'not JSON',
      );
    }
  }

  private authenticate(headers: Record<string, string>): void {
    const presented = headers[WEBHOOK_SECRET_HEADER];
    if (!presented) {
      throw new WebhookAuthError(`missing ${WEBHOOK_SECRET_HEADER} header`);
    }

    const candidate = Buffer.from(presented, 'utf8');
    if (candidate.length !== this.secret.length || !timingSafeEqual(candidate, this.secret)) {
      throw new WebhookAuthError(`wrong ${WEBHOOK_SECRET_HEADER} header`);
    }
  }

  private toNotificationEvent(payload: Record<string, unknown>): NotificationEvent {
    const dto = plainToInstance(DepositNotificationDto, payload);
    const errors = validateSync(dto);

    if (errors.length > 0) {
      throw new InputValidationError('payload', this.describeErrors(errors));
    }

    return {
      address: dto.address,
      amount: dto.amount,
      newStatus: dto.new_status,
      merchantCredential: dto.merchant_api_token,
    };
  }

  private describeErrors(errors: ValidationError[]): string {
    return errors
      .map((error) => Object.values(error.constraints ?? {}).join(', '))
      .join('; ');
  }

  /**
   * Lower-case header names; repeated headers keep their first value
   */
  private normalizeHeaders(headers: WebhookHeaders): Record<string, string> {
    const normalized: Record<string, string> = {};
    for (const [key, value] of Object.entries(headers)) {
      const first = Array.isArray(value) ? value[0] : value;
      if (first !== undefined) {
        normalized[key.toLowerCase()] = first;
      }
    }
    return normalized;
  }
}
