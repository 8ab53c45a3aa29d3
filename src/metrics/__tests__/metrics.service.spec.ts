import { Test, TestingModule } from '@nestjs/testing';
import { MetricsService } from '../metrics.service';
import { METRIC_PATHS } from '../metrics.constants';

describe('MetricsService', () => {
  let service: MetricsService;

  beforeEach(async () => {
    const module: TestingModule = await Test.createTestingModule({
      providers: [MetricsService],
    }).compile();

    service = module.get<MetricsService>(MetricsService);
  });

  afterEach(() => {
    jest.useRealTimers();
  });

  it('should initialize with all counters at zero', () => {
    const metrics = service.getMetrics();

    expect(metrics.credentials).toEqual({ issued_total: 0, stored_total: 0, retrieved_total: 0, conflicts_total: 0 });
    expect(metrics.status).toEqual({ allocated_total: 0, updated_total: 0, shards_total: 0 });
    expect(metrics.server.uptime_seconds).toBeGreaterThanOrEqual(0);
  });

  it('should increment by one by default', () => {
    service.increment(METRIC_PATHS.CREDENTIALS_ISSUED_TOTAL);
    service.increment(METRIC_PATHS.CREDENTIALS_ISSUED_TOTAL);

    expect(service.getMetrics().credentials.issued_total).toBe(2);
  });

  it('should increment by a custom value', () => {
    service.increment(METRIC_PATHS.STATUS_ALLOCATED_TOTAL, 50);

    expect(service.getMetrics().status.allocated_total).toBe(50);
  });

  it('should set a metric', () => {
    service.increment(METRIC_PATHS.STATUS_SHARDS_TOTAL);
    service.set(METRIC_PATHS.STATUS_SHARDS_TOTAL, 7);

    expect(service.getMetrics().status.shards_total).toBe(7);
  });

  it('should return independent snapshots', () => {
    const first = service.getMetrics();
    service.increment(METRIC_PATHS.CREDENTIALS_STORED_TOTAL);

    expect(first.credentials.stored_total).toBe(0);
    expect(service.getMetrics().credentials.stored_total).toBe(1);
  });

  it('should derive uptime from the start time', async () => {
    jest.useFakeTimers({ now: new Date('2026-01-01T00:00:00Z') });
    const module = await Test.createTestingModule({ providers: [MetricsService] }).compile();
    const timed = module.get(MetricsService);

    jest.setSystemTime(new Date('2026-01-01T00:01:30Z'));

    expect(timed.getMetrics().server.uptime_seconds).toBe(90);
  });
});
