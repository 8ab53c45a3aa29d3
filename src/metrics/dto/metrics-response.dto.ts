import { ApiProperty } from '@nestjs/swagger';

export class CredentialMetricsDto {
  @ApiProperty({ description: 'Credentials signed and returned to callers', example: 120 })
  issued_total!: number;

  @ApiProperty({ description: 'Credentials written to a vault', example: 118 })
  stored_total!: number;

  @ApiProperty({ description: 'Credentials read back from a vault', example: 40 })
  retrieved_total!: number;

  @ApiProperty({ description: 'Retrievals that found divergent duplicates', example: 0 })
  conflicts_total!: number;
}

export class StatusMetricsDto {
  @ApiProperty({ description: 'Status list slots handed out', example: 120 })
  allocated_total!: number;

  @ApiProperty({ description: 'Status updates applied', example: 3 })
  updated_total!: number;

  @ApiProperty({ description: 'Status list shards created', example: 3 })
  shards_total!: number;
}

export class ServerMetricsDto {
  @ApiProperty({ description: 'Server uptime in seconds since last restart', example: 86400 })
  uptime_seconds!: number;
}

/**
 * Response for GET /api/metrics
 */
export class MetricsResponseDto {
  @ApiProperty({ type: CredentialMetricsDto })
  credentials!: CredentialMetricsDto;

  @ApiProperty({ type: StatusMetricsDto })
  status!: StatusMetricsDto;

  @ApiProperty({ type: ServerMetricsDto })
  server!: ServerMetricsDto;
}
