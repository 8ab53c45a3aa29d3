import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { HealthIndicatorService, HttpHealthIndicator } from '@nestjs/terminus';
import type { HealthIndicatorResult } from '@nestjs/terminus';
import { VaultMode } from '../config/config.constants';

/**
 * Health indicator for the credential vault. The in-process vault is always up;
 * a remote EDV is pinged at its base URL.
 */
@Injectable()
export class VaultHealthIndicator {
  /* v8 ignore next 5 - false positive on constructor parameter properties */
  constructor(
    private readonly configService: ConfigService,
    private readonly http: HttpHealthIndicator,
    private readonly healthIndicatorService: HealthIndicatorService,
  ) {}

  async isHealthy(key: string): Promise<HealthIndicatorResult> {
    const mode = this.configService.get<VaultMode>('vcs.vault.mode', VaultMode.LOCAL);
    const indicator = this.healthIndicatorService.check(key);

    if (mode !== VaultMode.REMOTE) {
      return indicator.up({ mode });
    }

    const edvUrl = this.configService.get<string>('vcs.vault.edvUrl');
    if (!edvUrl) {
      return indicator.down({ mode, configured: false });
    }
    return this.http.pingCheck(key, edvUrl);
  }
}
