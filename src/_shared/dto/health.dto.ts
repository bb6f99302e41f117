import { ApiProperty } from '@nestjs/swagger';

export class HealthResponseDto {
  @ApiProperty({ example: 'healthy' })
  status!: 'healthy';

  @ApiProperty({ example: '2024-01-01T00:00:00.000Z' })
  timestamp!: string;

  @ApiProperty({ description: 'Process uptime in seconds', example: 3600 })
  uptime!: number;

  @ApiProperty({ description: 'Credentials with at least one enrolled chat', example: 2 })
  enrolledCredentials!: number;

  @ApiProperty({ description: 'Chat transport in use', example: 'telegraf' })
  transport!: string;
}
