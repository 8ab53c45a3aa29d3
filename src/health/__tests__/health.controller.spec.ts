import { Test, TestingModule } from '@nestjs/testing';
import { HealthCheckService } from '@nestjs/terminus';
import type { HealthCheckResult, HealthIndicatorFunction } from '@nestjs/terminus';
import { HealthController } from '../health.controller';
import { VaultHealthIndicator } from '../vault.health';

describe('HealthController', () => {
  let controller: HealthController;
  const check = jest.fn(async (indicators: HealthIndicatorFunction[]): Promise<HealthCheckResult> => {
    const results = await Promise.all(indicators.map((indicator) => indicator()));
    const details = Object.assign({}, ...results);
    return { status: 'ok', info: details, error: {}, details };
  });
  const vault = { isHealthy: jest.fn().mockResolvedValue({ vault: { status: 'up', mode: 'local' } }) };

  beforeEach(async () => {
    jest.clearAllMocks();
    const module: TestingModule = await Test.createTestingModule({
      controllers: [HealthController],
      providers: [
        { provide: HealthCheckService, useValue: { check } },
        { provide: VaultHealthIndicator, useValue: vault },
      ],
    }).compile();

    controller = module.get(HealthController);
  });

  it('reports the server and the vault', async () => {
    const result = await controller.check();

    expect(result.details).toEqual({
      server: { status: 'up' },
      vault: { status: 'up', mode: 'local' },
    });
    expect(vault.isHealthy).toHaveBeenCalledWith('vault');
  });
});
