import { KeyValueMap, SourceType } from '../repositories/types';
import { DataSourceView } from '../services/dataSource.service';

/** Wire form of a data source; the connection string is never returned. */
export interface DataSourceResponse {
  id: string;
  name: string;
  source_type: SourceType;
  is_active: boolean;
  metadata: KeyValueMap;
  etl_jobs_count: number;
  created_at: string;
  updated_at: string;
}

export const serializeDataSource = (source: DataSourceView): DataSourceResponse => ({
  id: source.id,
  name: source.name,
  source_type: source.sourceType,
  is_active: source.isActive,
  metadata: source.metadata,
  etl_jobs_count: source.etlJobsCount,
  created_at: source.createdAt.toISOString(),
  updated_at: source.updatedAt.toISOString(),
});
