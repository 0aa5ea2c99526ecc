import { WorkQueue } from '../../utils/queue';
import { createLogger } from '../../utils/logger';

const log = createLogger('dispatcher');

/** Payload carried by the ETL work queue. */
export interface EtlJobMessage {
  jobId: string;
  /** Zero-based execution attempt; retries increment it */
  attempt: number;
}

export interface DispatchOptions {
  attempt?: number;
  delayMs?: number;
}

/**
 * Hands job ids to the ETL work queue without waiting for execution
 */
export class JobDispatcher {
  constructor(private readonly queue: WorkQueue<EtlJobMessage>) {}

  async dispatch(jobId: string, { attempt = 0, delayMs = 0 }: DispatchOptions = {}): Promise<string> {
    const deliveryId = await this.queue.enqueue({ jobId, attempt }, { delayMs });
    log.info(`Dispatched job ${jobId}`, { attempt, delayMs, deliveryId });
    return deliveryId;
  }
}
