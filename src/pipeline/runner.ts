import {
  DataSourceRepository,
  EtlJobRepository,
  PipelineRunRecord,
  PipelineRunRepository,
  StageResult,
} from '../repositories/types';
import { JobLifecycleManager } from '../services/etl/lifecycle.service';
import { MetricService } from '../services/metrics/metric.service';
import { ConfigurationError, InvalidStateError, NotFoundError } from '../utils/errors';
import { createLogger } from '../utils/logger';
import { PIPELINE_JOBS } from './jobs';
import { PIPELINE_SCHEDULES } from './schedules';
import { PIPELINE_SENSORS } from './sensors';
import {
  DEFAULT_PIPELINE_CONFIG,
  PipelineConfig,
  PipelineJob,
  RunRequest,
  ScheduleDefinition,
  SensorDefinition,
  SensorResult,
} from './types';

const log = createLogger('pipeline');

export interface PipelineRunnerDependencies {
  runs: PipelineRunRepository;
  dataSources: DataSourceRepository;
  jobs: EtlJobRepository;
  metrics: MetricService;
  lifecycle: JobLifecycleManager;
}

export interface PipelineDefinitions {
  jobs: PipelineJob[];
  schedules: ScheduleDefinition[];
  sensors: SensorDefinition[];
}

export interface PipelineRunnerOptions {
  config?: PipelineConfig;
  definitions?: PipelineDefinitions;
  now?: () => Date;
}

/**
 * Launches pipeline jobs from schedules, sensors or direct requests. A run key is
 * launched at most once.
 */
export class PipelineRunner {
  private readonly deps: PipelineRunnerDependencies;
  private readonly config: PipelineConfig;
  private readonly now: () => Date;
  private jobs: Map<string, PipelineJob> = new Map();
  private schedules: Map<string, ScheduleDefinition> = new Map();
  readonly sensors: SensorDefinition[];

  constructor(deps: PipelineRunnerDependencies, options: PipelineRunnerOptions = {}) {
    const definitions = options.definitions ?? {
      jobs: PIPELINE_JOBS,
      schedules: PIPELINE_SCHEDULES,
      sensors: PIPELINE_SENSORS,
    };

    this.deps = deps;
    this.config = options.config ?? DEFAULT_PIPELINE_CONFIG;
    this.now = options.now ?? (() => new Date());
    definitions.jobs.forEach((job) => this.jobs.set(job.name, job));
    definitions.schedules.forEach((schedule) => this.schedules.set(schedule.name, schedule));
    this.sensors = definitions.sensors;
  }

  getSchedules(): ScheduleDefinition[] {
    return Array.from(this.schedules.values());
  }

  async triggerSchedule(name: string, scheduledTime: Date): Promise<PipelineRunRecord | null> {
    const schedule = this.schedules.get(name);
    if (!schedule) {
      throw new ConfigurationError(`Unknown pipeline schedule: ${name}`);
    }
    return this.launch(schedule.buildRequest(scheduledTime));
  }

  /**
   * Evaluate one sensor and launch its run request. A failing evaluation is logged
   * and reported as a skip.
   */
  async evaluateSensor(sensor: SensorDefinition): Promise<SensorResult> {
    let result: SensorResult;
    try {
      result = await sensor.evaluate({
        dataSources: this.deps.dataSources,
        jobs: this.deps.jobs,
        now: this.now(),
        maxRecoveryAttempts: this.deps.lifecycle.maxAutoRecoveries,
      });
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      log.error(`Error in ${sensor.name}: ${message}`);
      return { type: 'skip', reason: `${sensor.errorPrefix}: ${message}` };
    }

    if (result.type === 'skip') {
      log.debug(`${sensor.name} skipped: ${result.reason}`);
      return result;
    }

    await this.launch(result.request);
    return result;
  }

  async tick(): Promise<SensorResult[]> {
    const results: SensorResult[] = [];
    for (const sensor of this.sensors) {
      results.push(await this.evaluateSensor(sensor));
    }
    return results;
  }

  /**
   * Execute the requested job unless its run key was already launched. Returns the
   * finished run, or null when the request was a duplicate.
   */
  async launch(request: RunRequest): Promise<PipelineRunRecord | null> {
    const job = this.jobs.get(request.jobName);
    if (!job) {
      throw new ConfigurationError(`Unknown pipeline job: ${request.jobName}`);
    }

    const run = await this.deps.runs.createIfAbsent({
      runKey: request.runKey,
      jobName: job.name,
      trigger: request.trigger,
      tags: request.tags,
      startedAt: this.now(),
    });
    if (!run) {
      log.info(`Skipping run ${request.runKey}: already launched`);
      return null;
    }

    const runLog = log.child({ runKey: run.runKey, pipelineJob: job.name });
    const stages: StageResult[] = [];

    const stage = async <T>(
      name: string,
      rowsIn: number,
      materialize: () => T | Promise<T>,
      rowsOut: (output: T) => number
    ): Promise<T> => {
      const startedAt = Date.now();
      runLog.info(`Starting ${name}`, { inputRecords: rowsIn });

      const output = await materialize();
      const result: StageResult = { stage: name, rowsIn, rowsOut: rowsOut(output), durationMs: Date.now() - startedAt };
      stages.push(result);

      runLog.info(`Completed ${name}`, { outputRecords: result.rowsOut, durationMs: result.durationMs });
      return output;
    };

    try {
      const originalJobId = request.tags.original_job_id;
      if (request.trigger === 'retry' && originalJobId) {
        await this.requeueOriginalJob(originalJobId);
      }

      await job.run({ jobName: job.name, config: this.config, metrics: this.deps.metrics, log: runLog, now: this.now }, stage);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      runLog.error(`Pipeline run failed: ${message}`, { stages: stages.length });
      return this.deps.runs.update(run.runKey, { status: 'failure', stages, error: message, completedAt: this.now() });
    }

    runLog.info('Pipeline run succeeded', { stages: stages.length });
    return this.deps.runs.update(run.runKey, { status: 'success', stages, completedAt: this.now() });
  }

  private async requeueOriginalJob(jobId: string): Promise<void> {
    try {
      await this.deps.lifecycle.recoverJob(jobId);
      log.info(`Re-queued ETL job ${jobId} for automatic recovery`);
    } catch (error) {
      // Already retried, out of recoveries, or deleted since the sensor looked
      if (error instanceof InvalidStateError || error instanceof NotFoundError) {
        log.warn(`Automatic recovery skipped for job ${jobId}: ${error.message}`);
        return;
      }
      throw error;
    }
  }
}
