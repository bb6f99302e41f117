import { Controller, Inject, Logger, Post, Req, Res } from '@nestjs/common';
import { ApiTags } from '@nestjs/swagger';
import type { Request, Response } from 'express';
import { WebhookIngress } from '../../../core';
import { ApiDepositWebhookEndpoint } from '../../../_shared/swagger/decorators';
import { WEBHOOK_INGRESS } from '../constants';

/**
 * Bytes read by the raw body parser of configureHttpApp. Anything else
 * (the empty object left when no body was read) counts as no body.
 */
export function readRawBody(request: Request): Buffer | undefined {
  const body: unknown = request.body;
  return Buffer.isBuffer(body) && body.length > 0 ? body : undefined;
}

/**
 * Webhook Controller
 *
 * Push endpoint of the payments API. Answers with a constant text/plain body.
 */
@ApiTags('Webhook')
@Controller('webhook')
export class WebhookController {
  private readonly logger = new Logger(WebhookController.name);

  constructor(
    @Inject(WEBHOOK_INGRESS)
    private readonly ingress: WebhookIngress,
  ) {}

  @Post()
  @ApiDepositWebhookEndpoint()
  async handleWebhook(
    @Req() request: Request,
    @Res() response: Response,
  ): Promise<void> {
    this.logger.debug(`Received webhook from ${request.ip ?? 'unknown address'}`);

    const result = await this.ingress.handle({
      headers: request.headers,
      body: readRawBody(request),
    });

    response.status(result.status).type('text/plain').send(result.body);
  }
}
