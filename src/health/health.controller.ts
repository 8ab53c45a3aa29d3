import { Controller, Get } from '@nestjs/common';
import { HealthCheck, HealthCheckService } from '@nestjs/terminus';
import type { HealthCheckResult } from '@nestjs/terminus';
import { ApiTags, ApiOperation, ApiResponse } from '@nestjs/swagger';
import { VaultHealthIndicator } from './vault.health';
import { HealthResponseDto } from './dto/health-response.dto';

/**
 * Controller for handling health checks.
 */
@ApiTags('Health')
@Controller('health')
export class HealthController {
  /* v8 ignore next 4 - false positive on constructor parameter properties */
  constructor(
    private readonly health: HealthCheckService,
    private readonly vault: VaultHealthIndicator,
  ) {}

  @Get()
  @HealthCheck()
  @ApiOperation({
    summary: 'Get Application Health Status',
    description: 'Reports whether the service is up and, in remote vault mode, whether the EDV server is reachable.',
  })
  @ApiResponse({
    status: 200,
    description: 'The application is healthy. See the response body for detailed status of each component.',
    type: HealthResponseDto,
  })
  @ApiResponse({
    status: 503,
    description: 'The application is unhealthy. One or more health checks failed.',
    type: HealthResponseDto,
  })
  check(): Promise<HealthCheckResult> {
    return this.health.check([() => Promise.resolve({ server: { status: 'up' } }), () => this.vault.isHealthy('vault')]);
  }
}
