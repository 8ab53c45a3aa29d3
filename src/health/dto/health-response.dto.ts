import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';

/**
 * Response for GET /health endpoint
 */
export class HealthResponseDto {
  @ApiProperty({
    description: 'Overall health status',
    example: 'ok',
    enum: ['ok', 'error'],
  })
  status!: string;

  @ApiPropertyOptional({
    description: 'Indicators that are up',
    example: { server: { status: 'up' }, vault: { status: 'up', mode: 'local' } },
  })
  info?: Record<string, unknown>;

  @ApiPropertyOptional({
    description: 'Indicators that are down',
    example: { vault: { status: 'down', message: 'connect ECONNREFUSED' } },
  })
  error?: Record<string, unknown>;

  @ApiProperty({
    description: 'Results of all indicators',
    example: { server: { status: 'up' }, vault: { status: 'up', mode: 'remote' } },
  })
  details!: Record<string, unknown>;
}
