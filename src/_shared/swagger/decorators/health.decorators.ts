import { applyDecorators } from '@nestjs/common';
import { ApiOperation, ApiResponse } from '@nestjs/swagger';
import { HealthResponseDto } from '../../dto';

/**
 * Swagger decorator for basic health check
 */
export const ApiHealthCheck = () => {
  return applyDecorators(
    ApiOperation({
      summary: 'Basic health check',
      description: 'Returns service health status, uptime and enrollment count',
    }),
    ApiResponse({
      status: 200,
      description: 'Service is healthy',
      type: HealthResponseDto,
    }),
  );
};
