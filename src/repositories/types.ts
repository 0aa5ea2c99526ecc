import { Page, PaginationOptions, SortSpec } from '../utils/pagination';

export const SOURCE_TYPES = ['database', 'api', 'file', 'stream'] as const;
export type SourceType = (typeof SOURCE_TYPES)[number];

export const JOB_STATUSES = ['pending', 'running', 'completed', 'failed', 'cancelled'] as const;
export type JobStatus = (typeof JOB_STATUSES)[number];

export const METRIC_TYPES = ['counter', 'gauge', 'histogram', 'summary'] as const;
export type MetricType = (typeof METRIC_TYPES)[number];

/** Schemaless map; each consumer documents and checks the keys it reads. */
export type KeyValueMap = Record<string, unknown>;
export type LabelValue = string | number | boolean;
export type Labels = Record<string, LabelValue>;

export interface UserRecord {
  id: string;
  username: string;
  email: string;
  firstName: string;
  lastName: string;
  isActive: boolean;
  dateJoined: Date;
}

export interface ApiKeyRecord {
  id: string;
  name: string;
  key: string;
  userId: string;
  isActive: boolean;
  expiresAt: Date | null;
  lastUsedAt: Date | null;
  createdAt: Date;
  updatedAt: Date;
}

export interface DataSourceRecord {
  id: string;
  name: string;
  sourceType: SourceType;
  connectionString: string;
  isActive: boolean;
  metadata: KeyValueMap;
  createdAt: Date;
  updatedAt: Date;
}

export interface EtlJobRecord {
  id: string;
  name: string;
  status: JobStatus;
  dataSourceId: string;
  startedAt: Date | null;
  completedAt: Date | null;
  recordsProcessed: number;
  errorMessage: string;
  /** Automatic recoveries applied after the job failed for good */
  recoveryAttempts: number;
  configuration: KeyValueMap;
  createdAt: Date;
  updatedAt: Date;
}

export interface MetricRecord {
  id: string;
  metricName: string;
  metricValue: number;
  metricType: MetricType;
  labels: Labels;
  timestamp: Date;
  createdAt: Date;
}

export type PipelineRunStatus = 'started' | 'success' | 'failure';

export interface StageResult {
  stage: string;
  rowsIn: number;
  rowsOut: number;
  durationMs: number;
}

export interface PipelineRunRecord {
  id: string;
  runKey: string;
  jobName: string;
  trigger: string;
  tags: Record<string, string>;
  status: PipelineRunStatus;
  stages: StageResult[];
  error: string | null;
  startedAt: Date;
  completedAt: Date | null;
}

// ---------------------------------------------------------------------------
// Inputs and filters
// ---------------------------------------------------------------------------

export type NewUser = Pick<UserRecord, 'username' | 'email'> & Partial<Pick<UserRecord, 'firstName' | 'lastName'>>;

export interface NewApiKey {
  name: string;
  key: string;
  userId: string;
  isActive?: boolean;
  expiresAt?: Date | null;
}

export type ApiKeyUpdate = Partial<Pick<ApiKeyRecord, 'name' | 'isActive' | 'expiresAt'>>;

export interface NewDataSource {
  name: string;
  sourceType: SourceType;
  connectionString: string;
  isActive?: boolean;
  metadata?: KeyValueMap;
}

export type DataSourceUpdate = Partial<NewDataSource>;

export interface DataSourceFilter {
  sourceType?: SourceType;
  isActive?: boolean;
  search?: string;
  updatedSince?: Date;
}

export interface NewEtlJob {
  name: string;
  dataSourceId: string;
  configuration?: KeyValueMap;
}

/** Fields a lifecycle transition may write besides the status. */
export type JobTransitionPatch = Partial<
  Pick<EtlJobRecord, 'startedAt' | 'completedAt' | 'recordsProcessed' | 'errorMessage' | 'recoveryAttempts'>
> & { status: JobStatus };

export interface JobTransitionGuard {
  startedBefore?: Date;
}

export interface EtlJobFilter {
  statuses?: JobStatus[];
  dataSourceIds?: string[];
  name?: string;
  nameContains?: string;
  search?: string;
  createdAfter?: Date;
  createdBefore?: Date;
  startedAfter?: Date;
  startedBefore?: Date;
  completedAfter?: Date;
  completedBefore?: Date;
  minRecords?: number;
  maxRecords?: number;
  hasErrors?: boolean;
  errorContains?: string;
  recoveryAttemptsBelow?: number;
}

export interface NewMetric {
  metricName: string;
  metricValue: number;
  metricType?: MetricType;
  labels?: Labels;
  timestamp?: Date;
}

export interface MetricFilter {
  nameContains?: string;
  metricType?: MetricType;
  timestampAfter?: Date;
  timestampBefore?: Date;
  minValue?: number;
  maxValue?: number;
  hasLabels?: boolean;
  labelKey?: string;
  labelValue?: string;
}

export type NewPipelineRun = Pick<PipelineRunRecord, 'runKey' | 'jobName' | 'trigger' | 'tags' | 'startedAt'>;
export type PipelineRunUpdate = Partial<Pick<PipelineRunRecord, 'status' | 'stages' | 'error' | 'completedAt'>>;

// ---------------------------------------------------------------------------
// Repositories
// ---------------------------------------------------------------------------

export interface UserRepository {
  create(input: NewUser): Promise<UserRecord>;
  findById(id: string): Promise<UserRecord | null>;
  findByUsername(username: string): Promise<UserRecord | null>;
}

export interface ApiKeyRepository {
  create(input: NewApiKey): Promise<ApiKeyRecord>;
  findByKey(key: string): Promise<ApiKeyRecord | null>;
  findForUser(id: string, userId: string): Promise<ApiKeyRecord | null>;
  listForUser(userId: string, search: string | undefined, options: PaginationOptions): Promise<Page<ApiKeyRecord>>;
  update(id: string, userId: string, patch: ApiKeyUpdate): Promise<ApiKeyRecord | null>;
  delete(id: string, userId: string): Promise<boolean>;
  markUsed(id: string, at: Date): Promise<void>;
}

export interface DataSourceRepository {
  create(input: NewDataSource): Promise<DataSourceRecord>;
  findById(id: string): Promise<DataSourceRecord | null>;
  findByIds(ids: string[]): Promise<DataSourceRecord[]>;
  /** Case-insensitive exact name lookup. */
  findByName(name: string): Promise<DataSourceRecord | null>;
  findIdsByNameContains(fragment: string): Promise<string[]>;
  list(filter: DataSourceFilter, options: PaginationOptions): Promise<Page<DataSourceRecord>>;
  find(filter: DataSourceFilter, sort: SortSpec, limit?: number): Promise<DataSourceRecord[]>;
  count(filter?: DataSourceFilter): Promise<number>;
  update(id: string, patch: DataSourceUpdate): Promise<DataSourceRecord | null>;
  delete(id: string): Promise<boolean>;
}

export interface EtlJobRepository {
  create(input: NewEtlJob): Promise<EtlJobRecord>;
  findById(id: string): Promise<EtlJobRecord | null>;
  list(filter: EtlJobFilter, options: PaginationOptions): Promise<Page<EtlJobRecord>>;
  find(filter: EtlJobFilter, sort: SortSpec, limit?: number): Promise<EtlJobRecord[]>;
  count(filter?: EtlJobFilter): Promise<number>;
  countByDataSource(dataSourceIds: string[]): Promise<Map<string, number>>;
  /**
   * Atomically applies `patch` if the job's current status is one of `from` and the guard holds.
   * Returns the updated job, or null when the job is missing or the precondition failed.
   */
  transition(
    id: string,
    from: readonly JobStatus[],
    patch: JobTransitionPatch,
    guard?: JobTransitionGuard
  ): Promise<EtlJobRecord | null>;
  deleteByDataSource(dataSourceId: string): Promise<number>;
}

export interface MetricRepository {
  create(input: NewMetric): Promise<MetricRecord>;
  list(filter: MetricFilter, options: PaginationOptions): Promise<Page<MetricRecord>>;
  deleteOlderThan(cutoff: Date): Promise<number>;
}

export interface PipelineRunRepository {
  /** Returns null when a run with the same run key already exists. */
  createIfAbsent(input: NewPipelineRun): Promise<PipelineRunRecord | null>;
  update(runKey: string, patch: PipelineRunUpdate): Promise<PipelineRunRecord | null>;
  findByRunKey(runKey: string): Promise<PipelineRunRecord | null>;
}

export interface Repositories {
  users: UserRepository;
  apiKeys: ApiKeyRepository;
  dataSources: DataSourceRepository;
  jobs: EtlJobRepository;
  metrics: MetricRepository;
  pipelineRuns: PipelineRunRepository;
}
