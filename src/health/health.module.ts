import { Module } from '@nestjs/common';
import { TerminusModule } from '@nestjs/terminus';
import { HttpModule } from '@nestjs/axios';
import { HealthController } from './health.controller';
import { VaultHealthIndicator } from './vault.health';

/**
 * The HealthModule provides health check endpoints for the application.
 */
@Module({
  imports: [TerminusModule, HttpModule],
  controllers: [HealthController],
  providers: [VaultHealthIndicator],
})
export class HealthModule {}
