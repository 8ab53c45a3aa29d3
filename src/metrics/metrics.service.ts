import { Injectable } from '@nestjs/common';
import { METRIC_PATHS, type MetricPath } from './metrics.constants';
import { Metrics } from './interfaces';

/**
 * @class MetricsService
 * @description Collects the service's counters in process memory.
 * Counters start at zero on every boot; uptime is derived from the service start time.
 */
@Injectable()
export class MetricsService {
  /** Timestamp when the service was initialized, used for uptime calculation */
  private readonly startTime: number = Date.now();
  private readonly counters = new Map<MetricPath, number>();

  /**
   * Retrieves the current state of all metrics.
   * @returns A fresh snapshot; mutating it does not affect the counters.
   */
  getMetrics(): Readonly<Metrics> {
    return {
      credentials: {
        issued_total: this.read(METRIC_PATHS.CREDENTIALS_ISSUED_TOTAL),
        stored_total: this.read(METRIC_PATHS.CREDENTIALS_STORED_TOTAL),
        retrieved_total: this.read(METRIC_PATHS.CREDENTIALS_RETRIEVED_TOTAL),
        conflicts_total: this.read(METRIC_PATHS.CREDENTIALS_CONFLICTS_TOTAL),
      },
      status: {
        allocated_total: this.read(METRIC_PATHS.STATUS_ALLOCATED_TOTAL),
        updated_total: this.read(METRIC_PATHS.STATUS_UPDATED_TOTAL),
        shards_total: this.read(METRIC_PATHS.STATUS_SHARDS_TOTAL),
      },
      server: {
        uptime_seconds: Math.floor((Date.now() - this.startTime) / 1000),
      },
    };
  }

  /**
   * Increments a metric by the given value (default 1).
   */
  increment(path: MetricPath, value: number = 1): void {
    this.counters.set(path, this.read(path) + value);
  }

  set(path: MetricPath, value: number): void {
    this.counters.set(path, value);
  }

  private read(path: MetricPath): number {
    return this.counters.get(path) ?? 0;
  }
}
