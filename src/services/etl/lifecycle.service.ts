import { subHours } from 'date-fns';
import { etlConfig } from '../../config';
import {
  DataSourceRepository,
  EtlJobRecord,
  EtlJobRepository,
  JobStatus,
  JobTransitionPatch,
  NewEtlJob,
} from '../../repositories/types';
import {
  InvalidStateError,
  JobTimeoutError,
  NotFoundError,
  ProcessingFailureError,
  ValidationError,
} from '../../utils/errors';
import { createLogger } from '../../utils/logger';
import { MetricService } from '../metrics/metric.service';
import { DispatchOptions, EtlJobMessage, JobDispatcher } from './dispatcher';
import { JobProcessor } from './processors';

const log = createLogger('lifecycle');

export const RETRYABLE_STATUSES: readonly JobStatus[] = ['failed', 'cancelled'];

export type ExecutionOutcome = 'completed' | 'retrying' | 'failed' | 'skipped';

export interface LifecycleOptions {
  maxRetries: number;
  retryBaseDelayMs: number;
  /** Automatic recoveries a job gets after it failed for good */
  maxAutoRecoveries: number;
  stuckJobThresholdHours: number;
  now: () => Date;
}

export interface LifecycleDependencies {
  jobs: EtlJobRepository;
  dataSources: DataSourceRepository;
  metrics: MetricService;
  dispatcher: JobDispatcher;
  processor: JobProcessor;
}

/** Seconds between start and completion, or null unless both are set. */
export const jobDuration = (job: Pick<EtlJobRecord, 'startedAt' | 'completedAt'>): number | null =>
  job.startedAt && job.completedAt ? (job.completedAt.getTime() - job.startedAt.getTime()) / 1000 : null;

/**
 * Owns the ETL job state machine. Every status change is a compare-and-set on the
 * job record, so concurrent writers (retry endpoint, worker, reaper) cannot both
 * apply a transition to the same job.
 *
 *   pending -> running -> completed
 *                      -> pending   (retry with backoff, attempt < maxRetries)
 *                      -> failed    (retries exhausted, or reaped)
 *   failed | cancelled -> pending   (explicit retry)
 */
export class JobLifecycleManager {
  private readonly jobs: EtlJobRepository;
  private readonly dataSources: DataSourceRepository;
  private readonly metrics: MetricService;
  private readonly dispatcher: JobDispatcher;
  private readonly processor: JobProcessor;
  private readonly options: LifecycleOptions;

  constructor(deps: LifecycleDependencies, options: Partial<LifecycleOptions> = {}) {
    this.jobs = deps.jobs;
    this.dataSources = deps.dataSources;
    this.metrics = deps.metrics;
    this.dispatcher = deps.dispatcher;
    this.processor = deps.processor;
    this.options = {
      maxRetries: etlConfig.maxRetries,
      retryBaseDelayMs: etlConfig.retryBaseDelayMs,
      maxAutoRecoveries: etlConfig.maxAutoRecoveries,
      stuckJobThresholdHours: etlConfig.stuckJobThresholdHours,
      now: () => new Date(),
      ...options,
    };
  }

  get maxAutoRecoveries(): number {
    return this.options.maxAutoRecoveries;
  }

  /** Backoff before re-running a job that failed on `attempt` */
  retryDelayMs(attempt: number): number {
    return this.options.retryBaseDelayMs * 2 ** attempt;
  }

  async getJob(id: string): Promise<EtlJobRecord> {
    const job = await this.jobs.findById(id);
    if (!job) {
      throw new NotFoundError('ETL job not found');
    }
    return job;
  }

  /**
   * Persist a pending job for an active data source and dispatch its first attempt
   */
  async createJob(input: NewEtlJob): Promise<EtlJobRecord> {
    const dataSource = await this.dataSources.findById(input.dataSourceId);
    if (!dataSource) {
      throw new ValidationError('data_source', 'Data source does not exist.');
    }
    if (!dataSource.isActive) {
      throw new ValidationError('data_source', 'Cannot create job for inactive data source.');
    }

    const job = await this.jobs.create(input);
    log.info(`Created ETL job ${job.id} (${job.name}) for data source ${dataSource.name}`);

    await this.dispatchOrFail(job, { attempt: 0 });
    return job;
  }

  /**
   * Return a failed or cancelled job to pending and dispatch it again
   */
  async retryJob(id: string): Promise<EtlJobRecord> {
    const job = await this.getJob(id);
    return this.requeue(job, {});
  }

  /**
   * Retry a failed job on behalf of the recovery sensor. Each job is recovered at
   * most `maxAutoRecoveries` times, so a permanent failure stays failed.
   */
  async recoverJob(id: string): Promise<EtlJobRecord> {
    const job = await this.getJob(id);
    if (job.recoveryAttempts >= this.options.maxAutoRecoveries) {
      throw new InvalidStateError(`Automatic recovery exhausted after ${job.recoveryAttempts} attempts`);
    }
    return this.requeue(job, { recoveryAttempts: job.recoveryAttempts + 1 });
  }

  private async requeue(job: EtlJobRecord, patch: Pick<JobTransitionPatch, 'recoveryAttempts'>): Promise<EtlJobRecord> {
    if (!RETRYABLE_STATUSES.includes(job.status)) {
      throw new InvalidStateError('Only failed or cancelled jobs can be retried');
    }

    const updated = await this.jobs.transition(job.id, RETRYABLE_STATUSES, {
      ...patch,
      status: 'pending',
      errorMessage: '',
      startedAt: null,
      completedAt: null,
    });
    if (!updated) {
      // Status changed between the read and the write
      throw new InvalidStateError('Only failed or cancelled jobs can be retried');
    }

    log.info(`Retrying ETL job ${job.id} (previous status ${job.status})`);
    await this.dispatchOrFail(updated, { attempt: 0 });
    return updated;
  }

  /**
   * Run one delivery of a job: start it, process its source, then complete it or
   * route the failure through the retry loop.
   */
  async executeJob({ jobId, attempt }: EtlJobMessage): Promise<ExecutionOutcome> {
    const running = await this.start(jobId);
    if (!running) {
      return 'skipped';
    }

    try {
      const dataSource = await this.dataSources.findById(running.dataSourceId);
      if (!dataSource) {
        throw new NotFoundError('Data source not found');
      }

      await this.metrics.counter('etl_jobs_started', { job_name: running.name, data_source: dataSource.name });
      log.info(`Starting ETL job ${running.id}: ${running.name}`, { attempt });

      const records = await this.processor.process(dataSource.sourceType, running.configuration);
      return await this.complete(running, dataSource.name, records);
    } catch (error) {
      return this.fail(running, new ProcessingFailureError(error), attempt);
    }
  }

  /**
   * Force-fail running jobs whose start is older than the staleness threshold
   */
  async reapStuckJobs(): Promise<number> {
    const hours = this.options.stuckJobThresholdHours;
    const now = this.options.now();
    const cutoff = subHours(now, hours);
    const message = new JobTimeoutError(hours).message;

    // Strictly older than the cutoff
    const candidates = await this.jobs.find(
      { statuses: ['running'], startedBefore: new Date(cutoff.getTime() - 1) },
      { startedAt: 1 }
    );

    let reaped = 0;
    for (const job of candidates) {
      const updated = await this.jobs.transition(
        job.id,
        ['running'],
        { status: 'failed', errorMessage: message, completedAt: now },
        { startedBefore: cutoff }
      );
      if (!updated) {
        log.debug(`Job ${job.id} left running state before it could be reaped`);
        continue;
      }

      reaped += 1;
      await this.metrics.counter('etl_jobs_timeout', { job_name: job.name });
      log.warn(`Marked stuck job ${job.id} as failed`, { startedAt: job.startedAt?.toISOString() });
    }

    await this.metrics.counter('system_health_check', { component: 'worker' });
    log.info(`Health check completed. Found ${reaped} stuck jobs.`);
    return reaped;
  }

  /**
   * Dispatch a pending job. When the queue rejects the message the job is failed,
   * so the retry endpoint can pick it up again.
   */
  private async dispatchOrFail(job: EtlJobRecord, options: DispatchOptions): Promise<void> {
    try {
      await this.dispatcher.dispatch(job.id, options);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      log.error(`Failed to dispatch ETL job ${job.id}: ${reason}`);
      await this.jobs.transition(job.id, ['pending'], {
        status: 'failed',
        errorMessage: `Dispatch failed: ${reason}`,
        completedAt: this.options.now(),
      });
      throw error;
    }
  }

  private async start(jobId: string): Promise<EtlJobRecord | null> {
    const running = await this.jobs.transition(jobId, ['pending'], {
      status: 'running',
      startedAt: this.options.now(),
      completedAt: null,
    });
    if (!running) {
      log.warn(`Ignoring delivery for job ${jobId}: missing or no longer pending`);
    }
    return running;
  }

  private async complete(job: EtlJobRecord, dataSourceName: string, records: number): Promise<ExecutionOutcome> {
    const completed = await this.jobs.transition(job.id, ['running'], {
      status: 'completed',
      completedAt: this.options.now(),
      recordsProcessed: records,
    });
    if (!completed) {
      log.warn(`Job ${job.id} left running state before completion was recorded`);
      return 'skipped';
    }

    await this.metrics.gauge('etl_job_duration_seconds', jobDuration(completed) ?? 0, {
      job_name: completed.name,
      status: 'completed',
    });
    await this.metrics.gauge('etl_records_processed', records, {
      job_name: completed.name,
      data_source: dataSourceName,
    });

    log.info(`Completed ETL job ${job.id}: ${records} records processed`);
    return 'completed';
  }

  private async fail(job: EtlJobRecord, failure: ProcessingFailureError, attempt: number): Promise<ExecutionOutcome> {
    log.error(`ETL job ${job.id} failed on attempt ${attempt}: ${failure.message}`, {
      errorType: failure.classification,
    });
    await this.metrics.counter('etl_jobs_failed', { job_name: job.name, error_type: failure.classification });

    if (attempt < this.options.maxRetries) {
      const requeued = await this.jobs.transition(job.id, ['running'], {
        status: 'pending',
        startedAt: null,
        completedAt: null,
        errorMessage: failure.message,
      });
      if (!requeued) {
        log.warn(`Job ${job.id} left running state before its retry was scheduled`);
        return 'skipped';
      }

      const delayMs = this.retryDelayMs(attempt);
      await this.metrics.counter('etl_job_retries', { job_name: job.name, attempt: String(attempt + 1) });
      await this.dispatchOrFail(requeued, { attempt: attempt + 1, delayMs });
      return 'retrying';
    }

    const failed = await this.jobs.transition(job.id, ['running'], {
      status: 'failed',
      completedAt: this.options.now(),
      errorMessage: failure.message,
    });
    if (!failed) {
      log.warn(`Job ${job.id} left running state before its failure was recorded`);
      return 'skipped';
    }

    log.error(`ETL job ${job.id} failed after ${attempt} retries`);
    return 'failed';
  }
}
