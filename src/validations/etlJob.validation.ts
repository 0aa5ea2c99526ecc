import { JOB_STATUSES, JobStatus, KeyValueMap } from '../repositories/types';
import { paginationKeys } from '../utils/pagination';
import { Joi, csvOf, schemas } from '../utils/validation';

/** Lifecycle fields are server-controlled and not accepted here. */
export interface CreateEtlJobBody {
  name: string;
  data_source: string;
  configuration?: KeyValueMap;
}

export interface EtlJobListQuery {
  page: number;
  limit: number;
  ordering?: string;
  search?: string;
  status?: JobStatus[];
  data_source?: string;
  data_source_name?: string;
  name?: string;
  name__icontains?: string;
  created_after?: Date;
  created_before?: Date;
  started_after?: Date;
  started_before?: Date;
  completed_after?: Date;
  completed_before?: Date;
  min_records?: number;
  max_records?: number;
  has_errors?: boolean;
}

export const createEtlJobSchema = Joi.object<CreateEtlJobBody>({
  name: Joi.string().trim().max(100).required(),
  data_source: schemas.id.required(),
  configuration: schemas.keyValueMap,
});

export const listEtlJobsSchema = Joi.object<EtlJobListQuery>({
  ...paginationKeys,
  search: Joi.string().trim().allow(''),
  status: csvOf(JOB_STATUSES),
  data_source: schemas.id,
  data_source_name: Joi.string().trim(),
  name: Joi.string(),
  name__icontains: Joi.string().trim(),
  created_after: schemas.dateTime,
  created_before: schemas.dateTime,
  started_after: schemas.dateTime,
  started_before: schemas.dateTime,
  completed_after: schemas.dateTime,
  completed_before: schemas.dateTime,
  min_records: Joi.number().integer().min(0),
  max_records: Joi.number().integer().min(0),
  has_errors: schemas.queryBoolean,
});

export const ETL_JOB_ORDERING: Record<string, string> = {
  name: 'name',
  created_at: 'createdAt',
  started_at: 'startedAt',
  completed_at: 'completedAt',
  status: 'status',
};
