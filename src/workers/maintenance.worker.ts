import { queueConfig } from '../config';
import { JobLifecycleManager } from '../services/etl/lifecycle.service';
import { MetricService } from '../services/metrics/metric.service';
import { ReportService } from '../services/report.service';
import { createLogger } from '../utils/logger';
import { WorkQueue } from '../utils/queue';

const log = createLogger('maintenance-worker');

export const MAINTENANCE_TASKS = ['reap-stuck-jobs', 'purge-metrics', 'daily-report'] as const;
export type MaintenanceTask = (typeof MAINTENANCE_TASKS)[number];

export interface MaintenanceMessage {
  task: MaintenanceTask;
}

export interface MaintenanceServices {
  lifecycle: JobLifecycleManager;
  metrics: MetricService;
  reports: ReportService;
}

/**
 * Run one maintenance task; `at` is when the task was due
 */
export const runMaintenanceTask = async (
  task: MaintenanceTask,
  services: MaintenanceServices,
  at: Date
): Promise<void> => {
  switch (task) {
    case 'reap-stuck-jobs': {
      const reaped = await services.lifecycle.reapStuckJobs();
      log.info(`Reaper finished: ${reaped} jobs timed out`);
      return;
    }
    case 'purge-metrics': {
      await services.metrics.purgeExpired(at);
      return;
    }
    case 'daily-report': {
      await services.reports.generateDailyReport(at);
      return;
    }
  }
};

export const startMaintenanceWorker = (queue: WorkQueue<MaintenanceMessage>, services: MaintenanceServices): void => {
  queue.process(async ({ task }, delivery) => {
    log.debug(`Running maintenance task ${task}`, { deliveryId: delivery.id });
    await runMaintenanceTask(task, services, delivery.dueAt);
  });
};

/**
 * Register the periodic maintenance tasks, replacing any earlier registration
 */
export const scheduleMaintenance = async (queue: WorkQueue<MaintenanceMessage>): Promise<void> => {
  await queue.clearRepeatable();
  await queue.enqueue({ task: 'reap-stuck-jobs' }, { repeat: { every: queueConfig.reaperIntervalMs } });
  await queue.enqueue({ task: 'purge-metrics' }, { repeat: { every: queueConfig.retentionIntervalMs } });
  await queue.enqueue({ task: 'daily-report' }, { repeat: { pattern: queueConfig.dailyReportCron } });
  log.info('Maintenance tasks scheduled');
};
