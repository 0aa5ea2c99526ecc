import { EtlJobMessage } from '../services/etl/dispatcher';
import { JobLifecycleManager } from '../services/etl/lifecycle.service';
import { createLogger } from '../utils/logger';
import { WorkQueue } from '../utils/queue';

const log = createLogger('etl-worker');

/**
 * Consume the ETL queue; each delivery runs one attempt of one job
 */
export const startEtlWorker = (
  queue: WorkQueue<EtlJobMessage>,
  lifecycle: JobLifecycleManager,
  concurrency: number
): void => {
  queue.process(
    async (message, delivery) => {
      const outcome = await lifecycle.executeJob(message);
      log.info(`Delivery ${delivery.id} for job ${message.jobId} finished: ${outcome}`, { attempt: message.attempt });
    },
    { concurrency }
  );
};
