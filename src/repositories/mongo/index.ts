import { Repositories } from '../types';
import { MongoApiKeyRepository } from './apiKey.repository';
import { MongoDataSourceRepository } from './dataSource.repository';
import { MongoEtlJobRepository } from './etlJob.repository';
import { MongoMetricRepository } from './metric.repository';
import { MongoPipelineRunRepository } from './pipelineRun.repository';
import { MongoUserRepository } from './user.repository';

export const createMongoRepositories = (): Repositories => ({
  users: new MongoUserRepository(),
  apiKeys: new MongoApiKeyRepository(),
  dataSources: new MongoDataSourceRepository(),
  jobs: new MongoEtlJobRepository(),
  metrics: new MongoMetricRepository(),
  pipelineRuns: new MongoPipelineRunRepository(),
});
