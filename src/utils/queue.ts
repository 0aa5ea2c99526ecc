import { ConnectionOptions, Job, JobsOptions, Queue, Worker } from 'bullmq';
import { logger } from './logger';
import { redisConfig } from '../config';

// Redis connection options shared by queues and workers
const connection: ConnectionOptions = {
  host: redisConfig.host,
  port: redisConfig.port,
  password: redisConfig.password,
  enableReadyCheck: true,
  maxRetriesPerRequest: null,
};

// Retries are driven by the consumers, never by the queue
const defaultJobOptions: JobsOptions = {
  attempts: 1,
  removeOnComplete: 1000, // Keep last 1000 completed jobs
  removeOnFail: 5000, // Keep last 5000 failed jobs
};

export type RepeatOptions = { every: number } | { pattern: string };

export interface EnqueueOptions {
  /** Delay before the message becomes deliverable */
  delayMs?: number;
  /** Messages with an id already in the queue are dropped */
  jobId?: string;
  repeat?: RepeatOptions;
}

export interface Delivery {
  id: string;
  enqueuedAt: Date;
  /** When the message became deliverable (enqueue time plus delay) */
  dueAt: Date;
}

export type MessageHandler<T> = (message: T, delivery: Delivery) => Promise<void>;

export interface ProcessOptions {
  concurrency?: number;
}

/**
 * Durable work queue. Producers and consumers receive an instance explicitly;
 * nothing reaches for a process-wide client.
 */
export interface WorkQueue<T> {
  readonly name: string;
  enqueue(message: T, options?: EnqueueOptions): Promise<string>;
  /** Start consuming; a handler rejection is logged and the message dropped */
  process(handler: MessageHandler<T>, options?: ProcessOptions): void;
  /** Whether at least one consumer is attached */
  isResponsive(): Promise<boolean>;
  clearRepeatable(): Promise<void>;
  close(): Promise<void>;
}

/**
 * WorkQueue backed by a BullMQ queue on Redis
 */
export class BullWorkQueue<T> implements WorkQueue<T> {
  readonly name: string;
  // Payloads cross Redis untyped; the class's type parameter is the contract
  private readonly queue: Queue;
  private worker?: Worker;

  constructor(name: string) {
    this.name = name;
    this.queue = new Queue(name, { connection, prefix: redisConfig.keyPrefix, defaultJobOptions });

    this.queue.on('error', (error) => {
      logger.error(`Queue ${name} error: ${error.message}`);
    });
  }

  async enqueue(message: T, options: EnqueueOptions = {}): Promise<string> {
    const job = await this.queue.add(this.name, message, {
      delay: options.delayMs,
      jobId: options.jobId,
      repeat: options.repeat ? { ...options.repeat, tz: 'UTC' } : undefined,
    });
    const id = job.id ?? '';

    logger.debug(`Added job ${id} to queue ${this.name}`, { delayMs: options.delayMs ?? 0 });
    return id;
  }

  process(handler: MessageHandler<T>, options: ProcessOptions = {}): void {
    if (this.worker) {
      logger.warn(`Queue ${this.name} already has a consumer`);
      return;
    }

    this.worker = new Worker(
      this.name,
      async (job: Job) => {
        const enqueuedAt = new Date(job.timestamp);
        const message: T = job.data;
        await handler(message, {
          id: job.id ?? '',
          enqueuedAt,
          dueAt: new Date(job.timestamp + (job.opts.delay ?? 0)),
        });
      },
      { connection, prefix: redisConfig.keyPrefix, concurrency: options.concurrency ?? 1 }
    );

    // Worker event handlers
    this.worker.on('failed', (job, error) => {
      logger.error(`Worker failed job ${job?.id ?? 'unknown'} in queue ${this.name}: ${error.message}`, {
        stack: error.stack,
      });
    });

    this.worker.on('error', (error) => {
      logger.error(`Worker error in queue ${this.name}: ${error.message}`);
    });

    logger.info(`Consuming queue ${this.name} with concurrency ${options.concurrency ?? 1}`);
  }

  async isResponsive(): Promise<boolean> {
    const workers = await this.queue.getWorkers();
    return workers.length > 0;
  }

  async clearRepeatable(): Promise<void> {
    const repeatable = await this.queue.getRepeatableJobs();
    await Promise.all(repeatable.map((job) => this.queue.removeRepeatableByKey(job.key)));
  }

  async close(): Promise<void> {
    if (this.worker) {
      await this.worker.close();
    }
    await this.queue.close();
  }
}
