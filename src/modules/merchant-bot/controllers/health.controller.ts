import { Controller, Get, HttpCode, HttpStatus, Inject } from '@nestjs/common';
import { ApiTags } from '@nestjs/swagger';
import { CredentialDirectory } from '../../../core';
import { HealthResponseDto } from '../../../_shared/dto';
import { ApiHealthCheck } from '../../../_shared/swagger/decorators';
import { CREDENTIAL_DIRECTORY } from '../constants';
import { ConfigurationService } from '../services/configuration.service';

@ApiTags('Health')
@Controller('health')
export class HealthController {
  constructor(
    @Inject(CREDENTIAL_DIRECTORY)
    private readonly directory: CredentialDirectory,
    private readonly configuration: ConfigurationService,
  ) {}

  @Get()
  @HttpCode(HttpStatus.OK)
  @ApiHealthCheck()
  health(): HealthResponseDto {
    return {
      status: 'healthy',
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
      enrolledCredentials: this.directory.size,
      transport: this.configuration.getTransportType(),
    };
  }
}
