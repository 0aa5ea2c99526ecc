import { Logger } from 'winston';
import { DataSourceRepository, EtlJobRepository } from '../repositories/types';
import { MetricService } from '../services/metrics/metric.service';

export interface PipelineConfig {
  batchSize: number;
  sourceTable: string;
  targetTable: string;
}

export const DEFAULT_PIPELINE_CONFIG: PipelineConfig = {
  batchSize: 1000,
  sourceTable: 'raw_data',
  targetTable: 'processed_data',
};

/** Request to launch a pipeline job; launches are de-duplicated on `runKey`. */
export interface RunRequest {
  jobName: string;
  runKey: string;
  trigger: string;
  tags: Record<string, string>;
}

export type SensorResult = { type: 'run'; request: RunRequest } | { type: 'skip'; reason: string };

export interface AssetContext {
  jobName: string;
  config: PipelineConfig;
  metrics: MetricService;
  log: Logger;
  now: () => Date;
}

/**
 * Runs `materialize` as a named stage, logging and recording its row counts
 */
export type StageRunner = <T>(
  stage: string,
  rowsIn: number,
  materialize: () => T | Promise<T>,
  rowsOut: (output: T) => number
) => Promise<T>;

export interface PipelineJob {
  name: string;
  description: string;
  tags: Record<string, string>;
  run(context: AssetContext, stage: StageRunner): Promise<void>;
}

export interface ScheduleDefinition {
  name: string;
  jobName: string;
  /** Five-field cron expression evaluated in UTC */
  cron: string;
  enabledByDefault: boolean;
  description: string;
  buildRequest(scheduledTime: Date): RunRequest;
}

export interface SensorContext {
  dataSources: DataSourceRepository;
  jobs: EtlJobRepository;
  now: Date;
  /** Failed jobs recovered this many times are left alone */
  maxRecoveryAttempts: number;
}

export interface SensorDefinition {
  name: string;
  jobName: string;
  description: string;
  /** Prefix of the skip reason reported when evaluation itself fails */
  errorPrefix: string;
  evaluate(context: SensorContext): Promise<SensorResult>;
}
