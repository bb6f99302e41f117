import { applyDecorators } from '@nestjs/common';
import { ApiBody, ApiHeader, ApiOperation, ApiProduces, ApiResponse } from '@nestjs/swagger';
import { DepositNotificationDto } from '../../dto';

/**
 * Swagger decorator for the deposit webhook endpoint
 */
export const ApiDepositWebhookEndpoint = () => {
  return applyDecorators(
    ApiOperation({
      summary: 'Receive payment API notification',
      description:
        'Authenticates the shared secret and relays new_deposit events to every chat enrolled under the merchant credential. Other event kinds are accepted and ignored.',
    }),
    ApiHeader({
      name: 'X-API-Key',
      description: 'Webhook shared secret',
      required: true,
    }),
    ApiBody({ type: DepositNotificationDto }),
    ApiProduces('text/plain'),
    ApiResponse({
      status: 200,
      description: 'Accepted (relayed or ignored)',
      schema: { type: 'string', example: 'Success' },
    }),
    ApiResponse({
      status: 400,
      description: 'Malformed body or processing error',
      schema: { type: 'string', example: 'Error' },
    }),
    ApiResponse({
      status: 403,
      description: 'Missing or wrong shared secret',
      schema: { type: 'string', example: 'Unauthorized' },
    }),
  );
};
