import { subDays } from 'date-fns';
import { etlConfig } from '../../config';
import { Labels, MetricFilter, MetricRecord, MetricRepository, MetricType } from '../../repositories/types';
import { Page, PaginationOptions } from '../../utils/pagination';
import { createLogger } from '../../utils/logger';

const log = createLogger('metrics');

export interface RecordMetricInput {
  name: string;
  value: number;
  type?: MetricType;
  labels?: Labels;
}

/**
 * Append-only store of named observations. Every write is one immutable row.
 */
export class MetricService {
  constructor(
    private readonly metrics: MetricRepository,
    private readonly retentionDays: number = etlConfig.metricRetentionDays
  ) {}

  record({ name, value, type = 'gauge', labels = {} }: RecordMetricInput): Promise<MetricRecord> {
    return this.metrics.create({ metricName: name, metricValue: value, metricType: type, labels });
  }

  counter(name: string, labels: Labels = {}): Promise<MetricRecord> {
    return this.record({ name, value: 1, type: 'counter', labels });
  }

  gauge(name: string, value: number, labels: Labels = {}): Promise<MetricRecord> {
    return this.record({ name, value, type: 'gauge', labels });
  }

  list(filter: MetricFilter, options: PaginationOptions): Promise<Page<MetricRecord>> {
    return this.metrics.list(filter, options);
  }

  /**
   * Delete rows older than the retention window and record the deleted count
   */
  async purgeExpired(now: Date = new Date()): Promise<number> {
    const cutoff = subDays(now, this.retentionDays);
    const deleted = await this.metrics.deleteOlderThan(cutoff);

    await this.gauge('metrics_cleanup', deleted, { retention_days: String(this.retentionDays) });
    log.info(`Cleaned up ${deleted} old metric records`, { cutoff: cutoff.toISOString() });

    return deleted;
  }
}
