import { countBy, omit, sumBy } from 'lodash';
import { EtlJobRepository } from '../repositories/types';
import { formatUtc, previousUtcDayRange } from '../utils/dateUtils';
import { createLogger } from '../utils/logger';
import { MetricService } from './metrics/metric.service';

const log = createLogger('reports');

export interface DailyReport {
  date: string;
  total_jobs: number;
  completed_jobs: number;
  failed_jobs: number;
  total_records_processed: number;
  success_rate: number;
}

export class ReportService {
  constructor(
    private readonly jobs: EtlJobRepository,
    private readonly metrics: MetricService
  ) {}

  /**
   * Summarize jobs created on the UTC day before `now` and record each figure as a gauge
   */
  async generateDailyReport(now: Date = new Date()): Promise<DailyReport> {
    const { start, end } = previousUtcDayRange(now);
    const date = formatUtc(start);

    const jobs = await this.jobs.find(
      { createdAfter: start, createdBefore: new Date(end.getTime() - 1) },
      { createdAt: 1 }
    );
    const byStatus = countBy(jobs, 'status');
    const completed = byStatus.completed ?? 0;

    const report: DailyReport = {
      date,
      total_jobs: jobs.length,
      completed_jobs: completed,
      failed_jobs: byStatus.failed ?? 0,
      total_records_processed: sumBy(
        jobs.filter((job) => job.status === 'completed'),
        'recordsProcessed'
      ),
      success_rate: jobs.length > 0 ? (completed / jobs.length) * 100 : 0,
    };

    log.info('Daily ETL report generated', report);

    for (const [key, value] of Object.entries(omit(report, 'date'))) {
      await this.metrics.gauge(`daily_report_${key}`, value, { date });
    }

    return report;
  }
}
