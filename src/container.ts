import { appConfig, etlConfig, healthConfig } from './config';
import { PipelineRunner, PipelineRunnerOptions } from './pipeline/runner';
import { Repositories } from './repositories/types';
import { ApiKeyService } from './services/apiKey.service';
import { DashboardService } from './services/dashboard.service';
import { DataSourceService } from './services/dataSource.service';
import { EtlJobMessage, JobDispatcher } from './services/etl/dispatcher';
import { EtlJobService } from './services/etl/etlJob.service';
import { JobLifecycleManager, LifecycleOptions } from './services/etl/lifecycle.service';
import { JobProcessor } from './services/etl/processors';
import { HealthProbes, HealthService } from './services/health.service';
import { MetricService } from './services/metrics/metric.service';
import { ReportService } from './services/report.service';
import { WorkQueue } from './utils/queue';
import { MaintenanceMessage } from './workers/maintenance.worker';
import { PipelineMessage } from './workers/pipeline.worker';

export interface Queues {
  etl: WorkQueue<EtlJobMessage>;
  maintenance: WorkQueue<MaintenanceMessage>;
  pipeline: WorkQueue<PipelineMessage>;
}

export interface ContextOptions {
  processor?: JobProcessor;
  lifecycle?: Partial<LifecycleOptions>;
  pipeline?: PipelineRunnerOptions;
  now?: () => Date;
}

/** Every service of the application, wired to one set of repositories and queues. */
export interface AppContext {
  repositories: Repositories;
  queues: Queues;
  metrics: MetricService;
  dispatcher: JobDispatcher;
  lifecycle: JobLifecycleManager;
  dataSources: DataSourceService;
  etlJobs: EtlJobService;
  apiKeys: ApiKeyService;
  dashboard: DashboardService;
  reports: ReportService;
  health: HealthService;
  pipeline: PipelineRunner;
}

export const createContext = (
  repositories: Repositories,
  queues: Queues,
  probes: HealthProbes,
  options: ContextOptions = {}
): AppContext => {
  const now = options.now ?? (() => new Date());
  const metrics = new MetricService(repositories.metrics);
  const dispatcher = new JobDispatcher(queues.etl);
  const processor = options.processor ?? new JobProcessor({ simulationScale: etlConfig.simulationScale });

  const lifecycle = new JobLifecycleManager(
    {
      jobs: repositories.jobs,
      dataSources: repositories.dataSources,
      metrics,
      dispatcher,
      processor,
    },
    { now, ...options.lifecycle }
  );

  const dataSources = new DataSourceService(repositories.dataSources, repositories.jobs);
  const etlJobs = new EtlJobService(repositories.jobs, repositories.dataSources, dataSources);

  return {
    repositories,
    queues,
    metrics,
    dispatcher,
    lifecycle,
    dataSources,
    etlJobs,
    apiKeys: new ApiKeyService(repositories.apiKeys, repositories.users, now),
    dashboard: new DashboardService(repositories.dataSources, repositories.jobs, etlJobs, now),
    reports: new ReportService(repositories.jobs, metrics),
    health: new HealthService(probes, { timeoutMs: healthConfig.timeoutMs, version: appConfig.version, now }),
    pipeline: new PipelineRunner(
      {
        runs: repositories.pipelineRuns,
        dataSources: repositories.dataSources,
        jobs: repositories.jobs,
        metrics,
        lifecycle,
      },
      { now, ...options.pipeline }
    ),
  };
};
