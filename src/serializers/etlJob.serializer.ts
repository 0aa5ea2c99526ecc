import { JobStatus, KeyValueMap } from '../repositories/types';
import { EtlJobView } from '../services/etl/etlJob.service';
import { jobDuration } from '../services/etl/lifecycle.service';
import { DataSourceResponse, serializeDataSource } from './dataSource.serializer';

export interface EtlJobResponse {
  id: string;
  name: string;
  status: JobStatus;
  data_source: DataSourceResponse | null;
  data_source_id: string;
  started_at: string | null;
  completed_at: string | null;
  records_processed: number;
  error_message: string;
  configuration: KeyValueMap;
  /** Seconds; null unless the job has both started and completed */
  duration: number | null;
  created_at: string;
  updated_at: string;
}

export const serializeEtlJob = (job: EtlJobView): EtlJobResponse => ({
  id: job.id,
  name: job.name,
  status: job.status,
  data_source: job.dataSource ? serializeDataSource(job.dataSource) : null,
  data_source_id: job.dataSourceId,
  started_at: job.startedAt ? job.startedAt.toISOString() : null,
  completed_at: job.completedAt ? job.completedAt.toISOString() : null,
  records_processed: job.recordsProcessed,
  error_message: job.errorMessage,
  configuration: job.configuration,
  duration: jobDuration(job),
  created_at: job.createdAt.toISOString(),
  updated_at: job.updatedAt.toISOString(),
});
