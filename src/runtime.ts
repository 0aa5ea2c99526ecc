import { etlConfig, queueConfig } from './config';
import { connectDB, disconnectDB, pingDB } from './config/database';
import { AppContext, Queues, createContext } from './container';
import { createMongoRepositories } from './repositories/mongo';
import { EtlJobMessage } from './services/etl/dispatcher';
import { connectRedis, createRedisClient, disconnectRedis, pingCache } from './utils/cache';
import { createLogger } from './utils/logger';
import { BullWorkQueue } from './utils/queue';
import { MaintenanceMessage, scheduleMaintenance, startMaintenanceWorker } from './workers/maintenance.worker';
import { startEtlWorker } from './workers/etl.worker';
import { PipelineMessage, schedulePipeline, startPipelineWorker } from './workers/pipeline.worker';

const log = createLogger('runtime');

export interface Runtime {
  ctx: AppContext;
  close(): Promise<void>;
}

/**
 * Connect MongoDB and Redis and wire the context over them
 */
export const startRuntime = async (): Promise<Runtime> => {
  await connectDB();
  const redis = createRedisClient();
  await connectRedis(redis);

  const queues: Queues = {
    etl: new BullWorkQueue<EtlJobMessage>(queueConfig.etlQueue),
    maintenance: new BullWorkQueue<MaintenanceMessage>(queueConfig.maintenanceQueue),
    pipeline: new BullWorkQueue<PipelineMessage>(queueConfig.pipelineQueue),
  };

  const ctx = createContext(createMongoRepositories(), queues, {
    database: pingDB,
    cache: () => pingCache(redis),
    worker: () => queues.etl.isResponsive(),
  });

  return {
    ctx,
    close: async () => {
      await Promise.all([queues.etl.close(), queues.maintenance.close(), queues.pipeline.close()]);
      await disconnectRedis(redis);
      await disconnectDB();
      log.info('Runtime closed');
    },
  };
};

/**
 * Attach every consumer and register the repeatable maintenance and pipeline messages
 */
export const startWorkers = async (ctx: AppContext): Promise<void> => {
  startEtlWorker(ctx.queues.etl, ctx.lifecycle, etlConfig.workerConcurrency);
  startMaintenanceWorker(ctx.queues.maintenance, {
    lifecycle: ctx.lifecycle,
    metrics: ctx.metrics,
    reports: ctx.reports,
  });
  startPipelineWorker(ctx.queues.pipeline, ctx.pipeline);

  await scheduleMaintenance(ctx.queues.maintenance);
  await schedulePipeline(ctx.queues.pipeline, ctx.pipeline);
  log.info('Workers started');
};
